import { randomUUID } from "node:crypto";
import {
  DependencyNotFoundError,
  InvalidTransitionError,
  NoActiveWorkflowError,
  PlanValidationError,
  TaskNotFoundError,
} from "../errors.js";
import type { TaskStore } from "../persistence/store.js";
import { log } from "../utils/logger.js";
import { canTransition, createTask, isTerminal } from "./task.js";
import { deriveWorkflowStatus, executableTasks, findCycle, topologicalOrder } from "./task-graph.js";
import type { Artifacts, Task, TaskResult, TaskStatus, TaskType, WorkflowMeta, WorkflowStatus } from "./types.js";

const logger = log.scope("task-manager");

/** In-memory state of one workflow: its tasks in insertion order and the reverse dependency index. */
export class WorkflowContext {
  readonly meta: WorkflowMeta;
  readonly tasks = new Map<string, Task>();
  /** task id → ids of tasks that list it as a dependency */
  readonly dependents = new Map<string, string[]>();

  constructor(meta: WorkflowMeta) {
    this.meta = meta;
  }

  get id(): string {
    return this.meta.id;
  }

  addDependent(dependencyId: string, dependentId: string): void {
    const list = this.dependents.get(dependencyId) ?? [];
    if (!list.includes(dependentId)) list.push(dependentId);
    this.dependents.set(dependencyId, list);
  }

  removeDependent(dependencyId: string, dependentId: string): void {
    const list = this.dependents.get(dependencyId);
    if (!list) return;
    const next = list.filter((id) => id !== dependentId);
    if (next.length > 0) this.dependents.set(dependencyId, next);
    else this.dependents.delete(dependencyId);
  }
}

/** One entry of an atomic batch insert. `key` and `dependsOn` are caller-local ids. */
export type TaskDraft = {
  key: string;
  description: string;
  taskType: TaskType;
  dependsOn: string[];
  metadata?: Record<string, unknown>;
};

/**
 * Check a batch as one graph and return it in dependency order, keeping the
 * given order wherever the edges allow. Throws PlanValidationError on a
 * duplicated key, an edge to an unknown key, a self edge, or a cycle.
 */
export function orderDrafts(drafts: readonly TaskDraft[]): TaskDraft[] {
  const keys = new Set<string>();
  for (const draft of drafts) {
    if (keys.has(draft.key)) throw new PlanValidationError(`Duplicate task key "${draft.key}"`);
    keys.add(draft.key);
  }
  for (const draft of drafts) {
    for (const dep of draft.dependsOn) {
      if (dep === draft.key) throw new PlanValidationError(`Task "${draft.key}" depends on itself`);
      if (!keys.has(dep)) {
        throw new PlanValidationError(`Task "${draft.key}" depends on unknown task "${dep}"`);
      }
    }
  }

  const nodes = drafts.map((draft) => ({ id: draft.key, dependencies: draft.dependsOn, draft }));
  const ordered = topologicalOrder(nodes);
  if (!ordered) {
    const cycle = findCycle(nodes) ?? [];
    throw new PlanValidationError(`Task dependencies contain a cycle: ${cycle.join(" -> ")}`);
  }
  return ordered.map((node) => node.draft);
}

export type TaskManagerOptions = {
  store: TaskStore;
};

/**
 * Owns the live dependency graph of one workflow and is the only place task
 * status changes. Every mutation is written through to the store.
 */
export class TaskManager {
  private store: TaskStore;
  private ctx?: WorkflowContext;

  constructor(opts: TaskManagerOptions) {
    this.store = opts.store;
  }

  /** The active workflow. Throws if none was created or loaded. */
  get context(): WorkflowContext {
    if (!this.ctx) throw new NoActiveWorkflowError();
    return this.ctx;
  }

  get workflowId(): string {
    return this.context.id;
  }

  createWorkflow(description: string): string {
    const meta: WorkflowMeta = { id: randomUUID(), description, createdAt: Date.now() };
    this.store.saveWorkflow(meta);
    this.ctx = new WorkflowContext(meta);
    logger.info(`Created workflow ${meta.id}`, { description });
    return meta.id;
  }

  /** Rehydrate from the store. Returns false when the id is unknown. */
  loadWorkflow(workflowId: string): boolean {
    const loaded = this.store.loadWorkflow(workflowId);
    if (!loaded.found) {
      logger.warn(`Workflow ${workflowId} does not exist`);
      return false;
    }

    const ctx = new WorkflowContext(loaded.meta);
    for (const task of loaded.tasks) {
      ctx.tasks.set(task.id, task);
      for (const dep of task.dependencies) ctx.addDependent(dep, task.id);
    }
    this.ctx = ctx;
    logger.info(`Loaded workflow ${workflowId} with ${ctx.tasks.size} tasks`);
    return true;
  }

  addTask(
    description: string,
    taskType: TaskType,
    dependencies: string[] = [],
    metadata: Record<string, unknown> = {},
  ): string {
    const ctx = this.context;
    const missing = dependencies.find((dep) => !ctx.tasks.has(dep));
    if (missing !== undefined) throw new DependencyNotFoundError(missing);

    const task = createTask({ description, taskType, dependencies, metadata });
    ctx.tasks.set(task.id, task);
    for (const dep of task.dependencies) ctx.addDependent(dep, task.id);
    this.persist(task);

    logger.info(`Added task ${task.id} to workflow ${ctx.id}`, { taskType, status: task.status });
    return task.id;
  }

  /**
   * Insert a whole batch whose edges refer to each other by draft key.
   * Nothing is created unless the batch passes orderDrafts. Returns draft key → task id.
   */
  addTasks(drafts: readonly TaskDraft[]): Map<string, string> {
    const ordered = orderDrafts(drafts);
    const ids = new Map<string, string>();
    for (const draft of ordered) {
      const deps = [...new Set(draft.dependsOn)].flatMap((key) => {
        const id = ids.get(key);
        return id === undefined ? [] : [id];
      });
      ids.set(draft.key, this.addTask(draft.description, draft.taskType, deps, draft.metadata));
    }
    logger.debug(`Added ${ids.size} tasks to workflow ${this.workflowId}`);
    return ids;
  }

  /**
   * Rewrite the edges of a task that has not started, without the
   * existence check addTask applies. The task is re-gated: blocked unless
   * every new dependency has already completed.
   */
  setTaskDependencies(taskId: string, dependencies: string[]): void {
    const ctx = this.context;
    const task = this.requireTask(taskId);
    if (task.status !== "pending" && task.status !== "blocked") {
      throw new InvalidTransitionError(taskId, task.status, "re-gated");
    }

    for (const dep of task.dependencies) ctx.removeDependent(dep, taskId);
    task.dependencies = [...dependencies];
    for (const dep of task.dependencies) ctx.addDependent(dep, taskId);
    task.status = this.allCompleted(task.dependencies) ? "pending" : "blocked";
    this.persist(task);
  }

  getTask(taskId: string): Task | undefined {
    return this.context.tasks.get(taskId);
  }

  getAllTasks(): Task[] {
    return [...this.context.tasks.values()];
  }

  /** The frontier: pending tasks whose dependencies have all completed. */
  getExecutableTasks(): Task[] {
    return executableTasks(this.getAllTasks());
  }

  /**
   * Move a task forward. Completing a task unblocks each direct dependent
   * whose dependencies are now all complete; that is the only way a task
   * leaves `blocked`.
   */
  updateTaskStatus(taskId: string, status: TaskStatus, result?: TaskResult): void {
    const ctx = this.context;
    const task = this.requireTask(taskId);
    if (!canTransition(task.status, status)) {
      throw new InvalidTransitionError(taskId, task.status, status);
    }

    // Written to the store first; the in-memory task only changes once that succeeded.
    const next: Task = { ...task, status };
    const now = Date.now();
    if (status === "in_progress" && next.startedAt === undefined) {
      next.startedAt = now;
    } else if (isTerminal(status) && next.completedAt === undefined) {
      next.completedAt = Math.max(now, next.startedAt ?? now);
    }
    if (result) next.result = result;
    this.persist(next);
    Object.assign(task, next);

    if (status === "completed") {
      for (const dependentId of ctx.dependents.get(taskId) ?? []) {
        const dependent = ctx.tasks.get(dependentId);
        if (dependent?.status === "blocked" && this.allCompleted(dependent.dependencies)) {
          dependent.status = "pending";
          this.persist(dependent);
          logger.debug(`Unblocked task ${dependentId}`);
        }
      }
    }

    logger.info(`Updated task ${taskId} status to ${status}`);
  }

  /** Reassign a task's type. The first original type is kept in `metadata.reclassified_from`. */
  reclassifyTask(taskId: string, taskType: TaskType, reason?: string): void {
    const task = this.requireTask(taskId);
    if (task.taskType === taskType) return;
    if (task.metadata.reclassified_from === undefined) {
      task.metadata.reclassified_from = task.taskType;
    }
    if (reason) task.metadata.reclassification_reason = reason;
    logger.info(`Reclassifying task ${taskId} from ${task.taskType} to ${taskType}`, { reason });
    task.taskType = taskType;
    this.persist(task);
  }

  /** Merge into a task's metadata and persist. */
  annotateTask(taskId: string, metadata: Record<string, unknown>): void {
    const task = this.requireTask(taskId);
    Object.assign(task.metadata, metadata);
    this.persist(task);
  }

  getWorkflowStatus(): WorkflowStatus {
    return deriveWorkflowStatus(this.workflowId, this.getAllTasks());
  }

  getTaskArtifacts(taskId: string): Artifacts {
    return this.getTask(taskId)?.result?.artifacts ?? {};
  }

  /** Artifacts of every dependency merged in dependency order; later keys win. */
  collectDependencyArtifacts(taskId: string): Artifacts {
    const task = this.requireTask(taskId);
    const merged: Artifacts = {};
    for (const dep of task.dependencies) {
      Object.assign(merged, this.getTaskArtifacts(dep));
    }
    return merged;
  }

  private allCompleted(ids: readonly string[]): boolean {
    return ids.every((id) => this.context.tasks.get(id)?.status === "completed");
  }

  private requireTask(taskId: string): Task {
    const task = this.context.tasks.get(taskId);
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  private persist(task: Task): void {
    this.store.saveTask(this.workflowId, task);
  }
}
