import { defaultClassifierChain } from "../classify/classifier.js";
import type { Classification, ClassifierChain } from "../classify/classifier.js";
import { getConfig } from "../config.js";
import { HandlerError, WorkflowNotFoundError, errorMessage } from "../errors.js";
import type { HandlerOutcome } from "../handlers/handler.js";
import type { HandlerRegistry } from "../handlers/registry.js";
import type { TaskStore } from "../persistence/store.js";
import { log } from "../utils/logger.js";
import { TaskManager } from "../workflow/manager.js";
import { diagnoseDeadlock } from "../workflow/task-graph.js";
import type { DeadlockReport } from "../workflow/task-graph.js";
import type { Artifacts, Task, TaskResult } from "../workflow/types.js";
import { DEFAULT_EXTRACTORS, enhanceDescription, extractArtifacts } from "./artifacts.js";
import type { ArtifactExtractor } from "./artifacts.js";
import { chooseTaskType, retryPolicyFromConfig } from "./retry-policy.js";
import type { FallbackTable, RetryPolicy } from "./retry-policy.js";
import { strategyFromConfig } from "./strategy.js";
import type { DispatchStrategy } from "./strategy.js";
import type { ExecutionOptions, ExecutionOutcome, ExecutionResult } from "./types.js";

const logger = log.scope("executor");

export type TaskExecutorOptions = {
  store: TaskStore;
  handlers: HandlerRegistry;
  /** Default: from executor.strategy / executor.maxConcurrency. */
  strategy?: DispatchStrategy;
  /** Default: keyword classifiers from data/classifier-keywords.json. */
  classifiers?: ClassifierChain;
  retryPolicy?: Partial<RetryPolicy>;
  extractors?: Readonly<Record<string, ArtifactExtractor>>;
  /** Default: executor.artifactPreviewLength. */
  artifactPreviewLength?: number;
};

export class TaskExecutor {
  private store: TaskStore;
  private handlers: HandlerRegistry;
  private strategy: DispatchStrategy;
  private classifiers: ClassifierChain;
  private retryPolicy: RetryPolicy;
  private extractors: Readonly<Record<string, ArtifactExtractor>>;
  private previewLength: number;

  constructor(opts: TaskExecutorOptions) {
    this.store = opts.store;
    this.handlers = opts.handlers;
    this.strategy = opts.strategy ?? strategyFromConfig();
    this.classifiers = opts.classifiers ?? defaultClassifierChain();
    this.retryPolicy = retryPolicyFromConfig(opts.retryPolicy);
    this.extractors = opts.extractors ?? DEFAULT_EXTRACTORS;
    this.previewLength = opts.artifactPreviewLength ?? getConfig().executor.artifactPreviewLength;
  }

  /** Load a workflow from the store into a fresh manager and run it. */
  async executeWorkflow(workflowId: string, opts?: ExecutionOptions): Promise<ExecutionResult> {
    const manager = new TaskManager({ store: this.store });
    if (!manager.loadWorkflow(workflowId)) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return this.execute(manager, opts);
  }

  /**
   * Run the manager's workflow until nothing is left to do, the remaining
   * tasks can never run, or the abort signal fires.
   */
  async execute(manager: TaskManager, opts?: ExecutionOptions): Promise<ExecutionResult> {
    const start = Date.now();
    const strategy = opts?.strategy ?? this.strategy;
    const workflowId = manager.workflowId;
    const results: Record<string, TaskResult> = {};
    const inFlight = new Map<string, Promise<void>>();
    let outcome: ExecutionOutcome = "completed";
    let deadlock: DeadlockReport | undefined;

    this.failInterrupted(manager, results);
    logger.info(`Executing workflow ${workflowId}`, {
      tasks: manager.getAllTasks().length,
      strategy: strategy.name,
    });

    try {
      for (;;) {
        if (opts?.abortSignal?.aborted) {
          outcome = "cancelled";
          logger.warn(`Workflow ${workflowId} cancelled`, { inFlight: inFlight.size });
          break;
        }

        const free = strategy.slots(inFlight.size);
        if (free > 0) {
          // Frontier query and claim happen in one synchronous turn, so a task is never dispatched twice.
          for (const task of manager.getExecutableTasks().slice(0, free)) {
            manager.updateTaskStatus(task.id, "in_progress");
            const run = this.runTask(manager, task, results, opts).finally(() => inFlight.delete(task.id));
            inFlight.set(task.id, run);
          }
        }

        if (inFlight.size === 0) {
          const status = manager.getWorkflowStatus();
          if (status.pendingTasks > 0) {
            outcome = "deadlock";
            deadlock = diagnoseDeadlock(manager.getAllTasks());
            logger.warn(`No executable tasks but ${status.pendingTasks} tasks pending in workflow ${workflowId}`, {
              cycles: deadlock.cycles,
              failedDependencies: deadlock.failedDependencies,
            });
          }
          break;
        }

        await Promise.race(inFlight.values());
      }
    } finally {
      await Promise.allSettled(inFlight.values());
    }

    const status = manager.getWorkflowStatus();
    logger.info(`Workflow ${workflowId} finished: ${outcome}`, {
      overallStatus: status.overallStatus,
      progress: status.progressPercentage,
    });

    return {
      workflowId,
      outcome,
      status,
      deadlock,
      durationMs: Date.now() - start,
      results,
    };
  }

  /** Tasks a previous run left in progress have no owner any more. */
  private failInterrupted(manager: TaskManager, results: Record<string, TaskResult>): void {
    for (const task of manager.getAllTasks()) {
      if (task.status !== "in_progress") continue;
      const result: TaskResult = { success: false, error: "Interrupted before completion", artifacts: {} };
      manager.updateTaskStatus(task.id, "failed", result);
      results[task.id] = result;
      logger.warn(`Task ${task.id} was left in progress by an earlier run; marked failed`);
    }
  }

  private async runTask(
    manager: TaskManager,
    task: Task,
    results: Record<string, TaskResult>,
    opts?: ExecutionOptions,
  ): Promise<void> {
    this.callHook("onTaskStart", task.id, () => opts?.onTaskStart?.(task));
    logger.info(`Executing task ${task.id}: ${task.description}`, { taskType: task.taskType });

    let result: TaskResult;
    try {
      result = storable(await this.attempt(manager, task, opts));
    } catch (err) {
      logger.error(`Error executing task ${task.id}`, { error: errorMessage(err) });
      result = { success: false, error: errorMessage(err), artifacts: {} };
    }

    results[task.id] = result;
    manager.updateTaskStatus(task.id, result.success ? "completed" : "failed", result);
    this.callHook("onTaskEnd", task.id, () => opts?.onTaskEnd?.(task, result));
  }

  /** Dispatch, then at most `maxRetries` more times when the failure points at another type. */
  private async attempt(manager: TaskManager, task: Task, opts?: ExecutionOptions): Promise<TaskResult> {
    const artifacts = manager.collectDependencyArtifacts(task.id);
    const description = enhanceDescription(task.description, artifacts, this.previewLength);

    this.reclassify(manager, task, this.retryPolicy.preDispatch, undefined, opts);

    let attempts = 1;
    let outcome = await this.dispatch(task, description, artifacts);
    while (!outcome.success && attempts <= this.retryPolicy.maxRetries) {
      const vote = this.reclassify(manager, task, this.retryPolicy.fallbacks, outcome.error ?? "", opts);
      if (!vote) break;
      attempts++;
      logger.info(`Retrying task ${task.id} as ${task.taskType}`, { attempt: attempts });
      outcome = await this.dispatch(task, description, artifacts);
    }
    if (attempts > 1) manager.annotateTask(task.id, { attempts });

    const extracted = extractArtifacts(task.taskType, outcome.result, this.extractors);
    if (outcome.success) {
      return { success: true, result: outcome.result, artifacts: extracted };
    }
    return {
      success: false,
      result: outcome.result,
      error: outcome.error ?? "Handler reported failure",
      artifacts: extracted,
    };
  }

  /**
   * Pick a type from `table`. With a failure text only votes matching it
   * count. A vote for the current type re-dispatches without a change.
   */
  private reclassify(
    manager: TaskManager,
    task: Task,
    table: FallbackTable,
    failure: string | undefined,
    opts?: ExecutionOptions,
  ): Classification | undefined {
    if (this.classifiers.size === 0) return undefined;
    const ranked = this.classifiers.rank({ description: task.description, taskType: task.taskType, failure });
    const vote = chooseTaskType(table, this.retryPolicy.minConfidence, task.taskType, ranked, {
      requireFailureMatch: failure !== undefined,
    });
    if (!vote || vote.taskType === task.taskType) return vote;

    const from = task.taskType;
    manager.reclassifyTask(task.id, vote.taskType, `${vote.classifier} matched: ${vote.matched.join(", ")}`);
    this.callHook("onReclassify", task.id, () => opts?.onReclassify?.(task, from, vote));
    return vote;
  }

  /** Callbacks observe the run; a throwing one is logged and the run goes on. */
  private callHook(name: string, taskId: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      logger.warn(`${name} callback failed for task ${taskId}`, { error: errorMessage(err) });
    }
  }

  private async dispatch(task: Task, description: string, artifacts: Artifacts): Promise<HandlerOutcome> {
    const handler = this.handlers.resolve(task.taskType);
    if (!handler) {
      return { success: false, error: `No handler registered for task type "${task.taskType}"` };
    }

    logger.debug(`Dispatching task ${task.id} to handler "${handler.name}"`, { taskType: task.taskType });
    try {
      return await handler.handle({ task, taskType: task.taskType, description, artifacts });
    } catch (err) {
      const error = new HandlerError("HANDLER_FAILED", `Handler "${handler.name}" threw: ${errorMessage(err)}`, {
        cause: err,
      });
      logger.error(error.message, { taskId: task.id });
      return { success: false, error: error.message };
    }
  }
}

/** A result the store cannot write as JSON is recorded as a failure instead. */
function storable(result: TaskResult): TaskResult {
  try {
    JSON.stringify(result);
    return result;
  } catch (err) {
    return { success: false, error: `Task result cannot be stored: ${errorMessage(err)}`, artifacts: {} };
  }
}
