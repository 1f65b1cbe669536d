import type { Classification } from "../classify/classifier.js";
import type { DeadlockReport } from "../workflow/task-graph.js";
import type { Task, TaskResult, TaskType, WorkflowStatus } from "../workflow/types.js";
import type { DispatchStrategy } from "./strategy.js";

export type ExecutionOptions = {
  /** Overrides the executor's strategy for this run. */
  strategy?: DispatchStrategy;
  onTaskStart?: (task: Readonly<Task>) => void;
  onTaskEnd?: (task: Readonly<Task>, result: TaskResult) => void;
  onReclassify?: (task: Readonly<Task>, from: TaskType, vote: Classification) => void;
  /** Stops new dispatches; running handlers are allowed to finish. */
  abortSignal?: AbortSignal;
};

export type ExecutionOutcome = "completed" | "deadlock" | "cancelled";

export type ExecutionResult = {
  workflowId: string;
  outcome: ExecutionOutcome;
  status: WorkflowStatus;
  /** Set when outcome is "deadlock". */
  deadlock?: DeadlockReport;
  durationMs: number;
  /** Results recorded during this run, by task id. */
  results: Record<string, TaskResult>;
};
