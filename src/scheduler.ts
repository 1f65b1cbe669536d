import { CompletionError, WorkflowNotFoundError } from "./errors.js";
import { TaskExecutor } from "./executor/executor.js";
import type { TaskExecutorOptions } from "./executor/executor.js";
import type { ExecutionOptions, ExecutionResult } from "./executor/types.js";
import { HandlerRegistry } from "./handlers/registry.js";
import type { TaskHandler } from "./handlers/handler.js";
import { TaskStore } from "./persistence/store.js";
import type { CompletionService } from "./planner/completion.js";
import { TaskPlanner } from "./planner/planner.js";
import type { UnresolvedDependencyPolicy } from "./planner/planner.js";
import { log } from "./utils/logger.js";
import { TaskManager } from "./workflow/manager.js";
import { BUILTIN_TASK_TYPES } from "./workflow/types.js";
import type { Task, TaskType, WorkflowMeta, WorkflowStatus } from "./workflow/types.js";

export type WorkflowSchedulerOptions = {
  /** Default: a store at storage.dbPath. */
  store?: TaskStore;
  handlers?: HandlerRegistry;
  /** Needed only for planTask. */
  completion?: CompletionService;
  unresolvedDependencies?: UnresolvedDependencyPolicy;
  executor?: Omit<TaskExecutorOptions, "store" | "handlers">;
};

/**
 * One entry point over store, manager, planner and executor. Managers are
 * cached per workflow id, so every call sees the same in-memory graph.
 */
export class WorkflowScheduler {
  readonly store: TaskStore;
  readonly handlers: HandlerRegistry;
  private completion?: CompletionService;
  private unresolvedDependencies?: UnresolvedDependencyPolicy;
  private executor: TaskExecutor;
  private managers = new Map<string, TaskManager>();

  constructor(opts?: WorkflowSchedulerOptions) {
    this.store = opts?.store ?? new TaskStore();
    this.handlers = opts?.handlers ?? new HandlerRegistry();
    this.completion = opts?.completion;
    this.unresolvedDependencies = opts?.unresolvedDependencies;
    this.executor = new TaskExecutor({ ...opts?.executor, store: this.store, handlers: this.handlers });
  }

  registerHandler(taskType: TaskType, handler: TaskHandler): this {
    this.handlers.register(taskType, handler);
    return this;
  }

  setCompletionService(completion: CompletionService): void {
    this.completion = completion;
  }

  createWorkflow(description: string): string {
    const manager = new TaskManager({ store: this.store });
    const id = manager.createWorkflow(description);
    this.managers.set(id, manager);
    return id;
  }

  addTask(
    workflowId: string,
    description: string,
    taskType: TaskType,
    dependencies: string[] = [],
    metadata: Record<string, unknown> = {},
  ): string {
    return this.manager(workflowId).addTask(description, taskType, dependencies, metadata);
  }

  async planTask(description: string): Promise<string> {
    if (!this.completion) {
      throw new CompletionError("No completion service configured");
    }
    const planner = new TaskPlanner({
      completion: this.completion,
      store: this.store,
      unresolvedDependencies: this.unresolvedDependencies,
      taskTypes: [...new Set<string>([...BUILTIN_TASK_TYPES, ...this.handlers.types()])],
    });
    const planned = await planner.plan(description);
    this.managers.set(planned.workflowId, planned.manager);
    return planned.workflowId;
  }

  async executeWorkflow(workflowId: string, opts?: ExecutionOptions): Promise<ExecutionResult> {
    return this.executor.execute(this.manager(workflowId), opts);
  }

  getAllTasks(workflowId: string): Task[] {
    return this.manager(workflowId).getAllTasks();
  }

  getWorkflowStatus(workflowId: string): WorkflowStatus {
    return this.manager(workflowId).getWorkflowStatus();
  }

  /** Low-level access for callers that need to reshape a graph directly. */
  getManager(workflowId: string): TaskManager {
    return this.manager(workflowId);
  }

  listWorkflows(limit?: number): WorkflowMeta[] {
    return this.store.listWorkflows(limit);
  }

  deleteWorkflow(workflowId: string): boolean {
    this.managers.delete(workflowId);
    return this.store.deleteWorkflow(workflowId);
  }

  close(): void {
    this.managers.clear();
    this.store.close();
    log.debug("Scheduler closed");
  }

  private manager(workflowId: string): TaskManager {
    const cached = this.managers.get(workflowId);
    if (cached) return cached;

    const manager = new TaskManager({ store: this.store });
    if (!manager.loadWorkflow(workflowId)) throw new WorkflowNotFoundError(workflowId);
    this.managers.set(workflowId, manager);
    return manager;
  }
}
