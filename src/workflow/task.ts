import { randomUUID } from "node:crypto";
import { StoreError, errorMessage } from "../errors.js";
import { TaskRecordSchema } from "../schemas.js";
import type { Task, TaskStatus, TaskType } from "./types.js";

export type NewTask = {
  description: string;
  taskType: TaskType;
  dependencies?: string[];
  metadata?: Record<string, unknown>;
};

/** Build a fresh task. Tasks with dependencies start blocked. */
export function createTask(input: NewTask): Task {
  const dependencies = [...(input.dependencies ?? [])];
  return {
    id: randomUUID(),
    description: input.description,
    taskType: input.taskType,
    status: dependencies.length > 0 ? "blocked" : "pending",
    dependencies,
    createdAt: Date.now(),
    metadata: { ...(input.metadata ?? {}) },
  };
}

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  blocked: ["pending"],
  pending: ["in_progress"],
  in_progress: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return status === "completed" || status === "failed";
}

export function serializeTask(task: Task): string {
  try {
    return JSON.stringify(task);
  } catch (err) {
    throw new StoreError(`Task ${task.id} cannot be stored as JSON: ${errorMessage(err)}`, { cause: err });
  }
}

export function deserializeTask(data: string): Task {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (err) {
    throw new StoreError("Stored task is not valid JSON", { cause: err });
  }
  const parsed = TaskRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new StoreError(`Stored task failed validation: ${issues}`);
  }
  return parsed.data;
}
