import type { HandlerInput } from "../../src/handlers/handler.js";
import { createTask } from "../../src/workflow/task.js";

export function makeInput(description: string, artifacts: Record<string, unknown> = {}): HandlerInput {
  const task = createTask({ description, taskType: "general_task" });
  return { task, taskType: task.taskType, description, artifacts };
}
