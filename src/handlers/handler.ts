import type { Artifacts, Task, TaskType } from "../workflow/types.js";

/** What a handler is given: the task plus its description enriched with upstream artifacts. */
export type HandlerInput = {
  task: Readonly<Task>;
  /** Task type the task is being dispatched as (may differ from the original tag after reclassification). */
  taskType: TaskType;
  /** Description with a rendering of the dependency artifacts appended. */
  description: string;
  /** Merged artifacts of the task's dependencies. */
  artifacts: Artifacts;
};

/** Opaque handler result. `error` is read only when `success` is false. */
export type HandlerOutcome = {
  success: boolean;
  result?: unknown;
  error?: string;
};

export interface TaskHandler {
  name: string;
  description?: string;

  handle(input: HandlerInput): Promise<HandlerOutcome>;
}
