export type ErrorCode =
  | "DEPENDENCY_NOT_FOUND"
  | "TASK_NOT_FOUND"
  | "WORKFLOW_NOT_FOUND"
  | "NO_ACTIVE_WORKFLOW"
  | "INVALID_TRANSITION"
  | "PLAN_PARSE_FAILED"
  | "PLAN_INVALID"
  | "COMPLETION_FAILED"
  | "HANDLER_FAILED"
  | "HANDLER_TIMEOUT"
  | "STORE_CORRUPT"
  | "DUPLICATE_REGISTRATION"
  | "VALIDATION_FAILED"
  | "CONFIG_INVALID";

/** Base class for every error the scheduler raises on purpose. */
export class SchedulerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DependencyNotFoundError extends SchedulerError {
  readonly dependencyId: string;

  constructor(dependencyId: string) {
    super("DEPENDENCY_NOT_FOUND", `Dependency task ${dependencyId} does not exist`);
    this.dependencyId = dependencyId;
  }
}

export class TaskNotFoundError extends SchedulerError {
  readonly taskId: string;

  constructor(taskId: string) {
    super("TASK_NOT_FOUND", `Task ${taskId} does not exist`);
    this.taskId = taskId;
  }
}

export class WorkflowNotFoundError extends SchedulerError {
  readonly workflowId: string;

  constructor(workflowId: string) {
    super("WORKFLOW_NOT_FOUND", `Workflow ${workflowId} does not exist`);
    this.workflowId = workflowId;
  }
}

export class NoActiveWorkflowError extends SchedulerError {
  constructor() {
    super("NO_ACTIVE_WORKFLOW", "No active workflow. Call createWorkflow or loadWorkflow first.");
  }
}

export class InvalidTransitionError extends SchedulerError {
  constructor(taskId: string, from: string, to: string) {
    super("INVALID_TRANSITION", `Task ${taskId} cannot move from ${from} to ${to}`);
  }
}

export class PlanParseError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PLAN_PARSE_FAILED", message, options);
  }
}

export class PlanValidationError extends SchedulerError {
  constructor(message: string) {
    super("PLAN_INVALID", message);
  }
}

export class CompletionError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("COMPLETION_FAILED", message, options);
  }
}

export class HandlerError extends SchedulerError {
  constructor(code: "HANDLER_FAILED" | "HANDLER_TIMEOUT", message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class StoreError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_CORRUPT", message, options);
  }
}

export class ValidationError extends SchedulerError {
  constructor(code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION", message: string) {
    super(code, message);
  }
}

export class ConfigError extends SchedulerError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

/** Message text of anything thrown, for recording into task results. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
