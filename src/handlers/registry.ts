import { ValidationError } from "../errors.js";
import { DEFAULT_TASK_TYPE } from "../workflow/types.js";
import type { TaskType } from "../workflow/types.js";
import type { TaskHandler } from "./handler.js";

/**
 * Task type → handler, fixed before a run starts. Types without a handler
 * resolve to the explicit default, then to the `general_task` handler.
 */
export class HandlerRegistry {
  private handlers = new Map<TaskType, TaskHandler>();
  private fallback?: TaskHandler;

  register(taskType: TaskType, handler: TaskHandler): this {
    if (taskType.length === 0) {
      throw new ValidationError("VALIDATION_FAILED", "Task type must be a non-empty string");
    }
    if (this.handlers.has(taskType)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Handler for "${taskType}" already registered`);
    }
    this.handlers.set(taskType, handler);
    return this;
  }

  remove(taskType: TaskType): boolean {
    return this.handlers.delete(taskType);
  }

  /** Handler used for task types nobody registered. */
  setDefault(handler: TaskHandler): this {
    this.fallback = handler;
    return this;
  }

  get(taskType: TaskType): TaskHandler | undefined {
    return this.handlers.get(taskType);
  }

  has(taskType: TaskType): boolean {
    return this.handlers.has(taskType);
  }

  types(): TaskType[] {
    return [...this.handlers.keys()];
  }

  /** Handler for a type, falling back to the default handler. */
  resolve(taskType: TaskType): TaskHandler | undefined {
    return this.handlers.get(taskType) ?? this.fallback ?? this.handlers.get(DEFAULT_TASK_TYPE);
  }
}
