#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { applyGlobalOptions, globalOptions } from "./cli-options.js";
import { getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { poolStrategy, serialStrategy } from "./executor/strategy.js";
import type { ExecutionResult } from "./executor/types.js";
import { HttpHandler } from "./handlers/http-handler.js";
import { HttpCompletionService } from "./planner/completion.js";
import { WorkflowScheduler } from "./scheduler.js";
import type { Task } from "./workflow/types.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

const program = new Command();

program
  .name("taskweave")
  .description("Plan tasks into dependency graphs and run them through handlers")
  .version("0.1.0")
  .option("--db <path>", "SQLite database file")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  applyGlobalOptions(globalOptions(actionCmd));
});

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Must be a positive integer.");
  return n;
}

function parseHeaders(values: string[] | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const value of values ?? []) {
    const idx = value.indexOf(":");
    if (idx <= 0) throw new InvalidArgumentError(`Header "${value}" is not "Name: value"`);
    headers[value.slice(0, idx).trim()] = value.slice(idx + 1).trim();
  }
  return headers;
}

function truncate(text: string, width: number): string {
  const oneLine = text.replace(/\s+/g, " ");
  return oneLine.length > width ? `${oneLine.slice(0, width - 1)}…` : oneLine;
}

function printTasks(tasks: Task[]): void {
  const width = getConfig().cli.descriptionWidth;
  for (const task of tasks) {
    const deps = task.dependencies.length > 0 ? ` <- ${task.dependencies.map((d) => d.slice(0, 8)).join(", ")}` : "";
    console.log(`[${task.status}] ${task.id.slice(0, 8)} ${task.taskType}: ${truncate(task.description, width)}${deps}`);
    if (task.result?.error) console.log(`    error: ${task.result.error}`);
  }
}

function printReport(report: ExecutionResult): void {
  const { status } = report;
  console.log(`\n--- ${report.outcome} ---`);
  console.log(
    `${status.completedTasks}/${status.totalTasks} completed, ${status.failedTasks} failed, ` +
      `${status.pendingTasks} pending (${status.overallStatus}, ${status.progressPercentage.toFixed(0)}%)`,
  );
  if (report.deadlock) {
    for (const cycle of report.deadlock.cycles) console.log(`  cycle: ${cycle.join(" -> ")}`);
    for (const [taskId, deps] of Object.entries(report.deadlock.failedDependencies)) {
      console.log(`  ${taskId} waits on failed ${deps.join(", ")}`);
    }
    for (const [taskId, deps] of Object.entries(report.deadlock.missingDependencies)) {
      console.log(`  ${taskId} waits on missing ${deps.join(", ")}`);
    }
  }
  console.log(`Finished in ${report.durationMs}ms`);
}

async function withScheduler(fn: (scheduler: WorkflowScheduler) => Promise<void> | void): Promise<void> {
  const scheduler = new WorkflowScheduler();
  try {
    await fn(scheduler);
  } catch (err) {
    console.error("Error:", errorMessage(err));
    process.exitCode = 1;
  } finally {
    scheduler.close();
  }
}

// --- plan ---
program
  .command("plan")
  .description("Break a request down into a workflow of dependent tasks")
  .argument("<request>", "What to accomplish")
  .requiredOption("-u, --completion-url <url>", "Completion endpoint (POST { prompt, systemPrompt } -> { text })")
  .option("-H, --header <header...>", "Extra request headers, as \"Name: value\"")
  .action(async (request: string, opts: { completionUrl: string; header?: string[] }) => {
    await withScheduler(async (scheduler) => {
      scheduler.setCompletionService(
        new HttpCompletionService({ url: opts.completionUrl, headers: parseHeaders(opts.header) }),
      );
      const workflowId = await scheduler.planTask(request);
      console.log(`Workflow ${workflowId}`);
      printTasks(scheduler.getAllTasks(workflowId));
    });
  });

// --- run ---
program
  .command("run")
  .description("Execute a stored workflow, sending every task to an HTTP handler")
  .argument("<workflowId>", "Workflow to run")
  .requiredOption("-u, --handler-url <url>", "Handler endpoint (POST { taskId, taskType, description, artifacts })")
  .option("-H, --header <header...>", "Extra request headers, as \"Name: value\"")
  .option("-s, --strategy <strategy>", "serial or pool")
  .option("-c, --concurrency <n>", "Tasks in flight with --strategy pool", parseCount)
  .action(
    async (
      workflowId: string,
      opts: { handlerUrl: string; header?: string[]; strategy?: string; concurrency?: number },
    ) => {
      await withScheduler(async (scheduler) => {
        const { executor } = getConfig();
        const name = opts.strategy ?? executor.strategy;
        if (name !== "serial" && name !== "pool") {
          throw new InvalidArgumentError(`Unknown strategy "${name}"`);
        }
        const strategy = name === "pool" ? poolStrategy(opts.concurrency ?? executor.maxConcurrency) : serialStrategy;

        scheduler.handlers.setDefault(
          new HttpHandler({ name: "http", url: opts.handlerUrl, headers: parseHeaders(opts.header) }),
        );

        const controller = new AbortController();
        const onSigint = () => {
          console.error("Stopping after running tasks finish...");
          controller.abort();
        };
        process.once("SIGINT", onSigint);
        try {
          const report = await scheduler.executeWorkflow(workflowId, {
            strategy,
            abortSignal: controller.signal,
            onTaskEnd: (task, result) => {
              console.log(`[${result.success ? "ok" : "failed"}] ${task.id.slice(0, 8)} ${task.taskType}`);
            },
            onReclassify: (task, from, vote) => {
              console.log(`[retype] ${task.id.slice(0, 8)} ${from} -> ${vote.taskType}`);
            },
          });
          printReport(report);
          if (report.outcome !== "completed" || report.status.failedTasks > 0) process.exitCode = 1;
        } finally {
          process.off("SIGINT", onSigint);
        }
      });
    },
  );

// --- status ---
program
  .command("status")
  .description("Show progress of a workflow")
  .argument("<workflowId>", "Workflow id")
  .action(async (workflowId: string) => {
    await withScheduler((scheduler) => {
      console.log(JSON.stringify(scheduler.getWorkflowStatus(workflowId), null, 2));
    });
  });

// --- tasks ---
program
  .command("tasks")
  .description("List the tasks of a workflow")
  .argument("<workflowId>", "Workflow id")
  .action(async (workflowId: string) => {
    await withScheduler((scheduler) => {
      printTasks(scheduler.getAllTasks(workflowId));
    });
  });

// --- list ---
program
  .command("list")
  .description("List stored workflows, newest first")
  .option("-l, --limit <n>", "Maximum number of workflows", parseCount, 20)
  .action(async (opts: { limit: number }) => {
    await withScheduler((scheduler) => {
      const width = getConfig().cli.descriptionWidth;
      for (const wf of scheduler.listWorkflows(opts.limit)) {
        console.log(`${wf.id}  ${new Date(wf.createdAt).toISOString()}  ${truncate(wf.description, width)}`);
      }
    });
  });

// --- delete ---
program
  .command("delete")
  .description("Delete a workflow and its tasks")
  .argument("<workflowId>", "Workflow id")
  .action(async (workflowId: string) => {
    await withScheduler((scheduler) => {
      if (scheduler.deleteWorkflow(workflowId)) {
        console.log(`Deleted ${workflowId}`);
      } else {
        console.error(`Workflow ${workflowId} does not exist`);
        process.exitCode = 1;
      }
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
