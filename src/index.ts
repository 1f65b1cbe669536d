// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { SchedulerConfig, DeepPartial } from "./config.js";

// Errors
export {
  SchedulerError,
  DependencyNotFoundError,
  TaskNotFoundError,
  WorkflowNotFoundError,
  NoActiveWorkflowError,
  InvalidTransitionError,
  PlanParseError,
  PlanValidationError,
  CompletionError,
  HandlerError,
  StoreError,
  ValidationError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, PlannerResponseSchema, TaskRecordSchema, HandlerOutcomeSchema } from "./schemas.js";
export type { PlannerResponse, PlannerSubtask } from "./schemas.js";

// Model
export { BUILTIN_TASK_TYPES, DEFAULT_TASK_TYPE, TASK_STATUSES } from "./workflow/types.js";
export type {
  Artifacts,
  BuiltinTaskType,
  OverallStatus,
  Task,
  TaskResult,
  TaskStatus,
  TaskType,
  WorkflowMeta,
  WorkflowStatus,
} from "./workflow/types.js";
export { createTask, serializeTask, deserializeTask } from "./workflow/task.js";
export { diagnoseDeadlock, findCycle, topologicalOrder } from "./workflow/task-graph.js";
export type { DeadlockReport } from "./workflow/task-graph.js";

// Persistence
export { TaskStore } from "./persistence/store.js";
export type { LoadedWorkflow } from "./persistence/store.js";

// Core
export { TaskManager, WorkflowContext, orderDrafts } from "./workflow/manager.js";
export type { TaskDraft, TaskManagerOptions } from "./workflow/manager.js";
export { TaskPlanner, extractPlanJson, parsePlan } from "./planner/planner.js";
export type { PlannedWorkflow, TaskPlannerOptions, UnresolvedDependencyPolicy } from "./planner/planner.js";
export { FunctionCompletionService, HttpCompletionService } from "./planner/completion.js";
export type { CompletionFunction, CompletionResult, CompletionService } from "./planner/completion.js";
export { TaskExecutor } from "./executor/executor.js";
export type { TaskExecutorOptions } from "./executor/executor.js";
export type { ExecutionOptions, ExecutionOutcome, ExecutionResult } from "./executor/types.js";
export { serialStrategy, poolStrategy } from "./executor/strategy.js";
export type { DispatchStrategy } from "./executor/strategy.js";
export { DEFAULT_FALLBACKS, DEFAULT_PRE_DISPATCH } from "./executor/retry-policy.js";
export type { FallbackTable, RetryPolicy } from "./executor/retry-policy.js";
export { DEFAULT_EXTRACTORS, enhanceDescription, renderArtifacts } from "./executor/artifacts.js";
export type { ArtifactExtractor } from "./executor/artifacts.js";
export { WorkflowScheduler } from "./scheduler.js";
export type { WorkflowSchedulerOptions } from "./scheduler.js";

// Classification
export { ClassifierChain, KeywordClassifier, defaultClassifierChain, loadKeywordClassifiers } from "./classify/classifier.js";
export type { Classification, ClassificationInput, TaskClassifier } from "./classify/classifier.js";

// Handlers
export type { HandlerInput, HandlerOutcome, TaskHandler } from "./handlers/handler.js";
export { HandlerRegistry } from "./handlers/registry.js";
export { FunctionHandler } from "./handlers/function-handler.js";
export type { FunctionHandlerOptions, HandlerFunction } from "./handlers/function-handler.js";
export { HttpHandler } from "./handlers/http-handler.js";
export type { HttpHandlerOptions } from "./handlers/http-handler.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { LogLevel, Logger } from "./utils/logger.js";
