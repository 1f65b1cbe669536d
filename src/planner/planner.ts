import { getConfig } from "../config.js";
import { CompletionError, PlanParseError, PlanValidationError, ValidationError, errorMessage } from "../errors.js";
import type { TaskStore } from "../persistence/store.js";
import { PlannerResponseSchema, parseOrThrow } from "../schemas.js";
import type { PlannerResponse } from "../schemas.js";
import { log } from "../utils/logger.js";
import { TaskManager, orderDrafts } from "../workflow/manager.js";
import type { TaskDraft } from "../workflow/manager.js";
import { BUILTIN_TASK_TYPES, DEFAULT_TASK_TYPE } from "../workflow/types.js";
import type { CompletionService } from "./completion.js";

const logger = log.scope("planner");

const TASK_TYPE_GUIDE: Record<string, string> = {
  file_creation: "Creating or modifying files, writing content to files, saving stories or text to files",
  web_browsing: "Browsing websites and gathering information from the internet ONLY (not for local file operations)",
  image_analysis: "Analyzing images",
  image_search: "Searching for and downloading images",
  file_organization: "Organizing files into categories",
  file_deletion: "Deleting files",
  general_task: "Any other type of task",
};

export function buildSystemPrompt(taskTypes: readonly string[]): string {
  const types = taskTypes
    .map((type) => `- ${type}: ${TASK_TYPE_GUIDE[type] ?? "Handled by a registered custom handler"}`)
    .join("\n");

  return `You are an expert task planner. Break complex tasks down into smaller, manageable subtasks with clear dependencies. For each subtask provide:
1. A clear description of what needs to be done
2. The type of task
3. Dependencies (ids of the subtasks that must be completed first)

Respond with a VALID JSON object only. Do NOT put comments (// or /* */) anywhere in the JSON.

Format:
{
  "main_task": "Description of the overall task",
  "subtasks": [
    { "id": "1", "description": "Subtask description", "task_type": "task_type", "dependencies": [] },
    { "id": "2", "description": "Another subtask", "task_type": "task_type", "dependencies": ["1"] }
  ]
}

Available task types:
${types}

Task type guidelines:
- Use file_creation for ANY task that creates, writes or saves content to a local file
- Use web_browsing ONLY for tasks that explicitly need the internet, such as "search for information about X" or "find news about Y"
- When in doubt between file_creation and web_browsing, prefer file_creation
- A simple file creation ("write a poem and save it as spring.txt") is ONE file_creation subtask; do not split it into "open editor", "write content", "save file"

Order the subtasks logically and make sure every dependency id refers to another subtask.`;
}

export function buildPlanPrompt(description: string): string {
  return `I need to break down this task into subtasks: ${description}\n\nProvide a detailed plan with clear dependencies between subtasks.`;
}

/**
 * Pull the plan object out of a completion: a fenced json block if there is
 * one, otherwise everything from the first `{` to the last `}`.
 */
export function extractPlanJson(text: string): unknown {
  const fenced = /```json\s*([\s\S]*?)```/i.exec(text);
  const candidate = fenced?.[1] ?? /\{[\s\S]*\}/.exec(text)?.[0];
  if (candidate === undefined) {
    throw new PlanParseError("No JSON object found in planner response");
  }

  try {
    return JSON.parse(candidate);
  } catch (err) {
    const preview = text.slice(0, getConfig().planner.responsePreviewLength);
    logger.error("Failed to parse planner response", { raw: preview });
    throw new PlanParseError(`Planner returned invalid JSON: ${errorMessage(err)}`, { cause: err });
  }
}

export function parsePlan(text: string): PlannerResponse {
  const json = extractPlanJson(text);
  try {
    return parseOrThrow(PlannerResponseSchema, json, "plan");
  } catch (err) {
    if (err instanceof ValidationError) throw new PlanParseError(err.message, { cause: err });
    throw err;
  }
}

export type UnresolvedDependencyPolicy = "reject" | "drop";

export type TaskPlannerOptions = {
  completion: CompletionService;
  store: TaskStore;
  /** Default: planner.unresolvedDependencies */
  unresolvedDependencies?: UnresolvedDependencyPolicy;
  /** Types the planner may assign. Default: the built-in types. */
  taskTypes?: readonly string[];
};

export type PlannedWorkflow = {
  workflowId: string;
  manager: TaskManager;
  /** plan-local id → task id */
  taskIds: Map<string, string>;
};

export class TaskPlanner {
  private completion: CompletionService;
  private store: TaskStore;
  private policy: UnresolvedDependencyPolicy;
  private taskTypes: readonly string[];

  constructor(opts: TaskPlannerOptions) {
    this.completion = opts.completion;
    this.store = opts.store;
    this.policy = opts.unresolvedDependencies ?? getConfig().planner.unresolvedDependencies;
    this.taskTypes = opts.taskTypes ?? BUILTIN_TASK_TYPES;
  }

  /** Ask for a breakdown of `description` and persist it as a new workflow. Returns its id. */
  async planTask(description: string): Promise<string> {
    return (await this.plan(description)).workflowId;
  }

  async plan(description: string): Promise<PlannedWorkflow> {
    logger.info(`Planning task: ${description}`);

    const completion = await this.completion.complete(
      buildPlanPrompt(description),
      buildSystemPrompt(this.taskTypes),
    );
    if (!completion.success) {
      throw new CompletionError(`Failed to generate task plan: ${completion.error}`);
    }

    const plan = parsePlan(completion.text);
    const drafts = orderDrafts(this.toDrafts(plan));

    const manager = new TaskManager({ store: this.store });
    const workflowId = manager.createWorkflow(plan.main_task ?? description);
    const taskIds = manager.addTasks(drafts);

    logger.info(`Created workflow ${workflowId} with ${taskIds.size} subtasks`);
    return { workflowId, manager, taskIds };
  }

  private toDrafts(plan: PlannerResponse): TaskDraft[] {
    const known = new Set(plan.subtasks.map((s) => s.id));

    return plan.subtasks.map((subtask) => {
      let taskType = subtask.task_type;
      if (!this.taskTypes.includes(taskType)) {
        logger.warn(`Unknown task type "${taskType}" for subtask ${subtask.id}; using ${DEFAULT_TASK_TYPE}`);
        taskType = DEFAULT_TASK_TYPE;
      }

      const dependsOn = subtask.dependencies.filter((dep) => {
        if (known.has(dep)) return true;
        if (this.policy === "reject") {
          throw new PlanValidationError(`Subtask ${subtask.id} depends on unknown subtask ${dep}`);
        }
        logger.warn(`Dropping dependency of subtask ${subtask.id} on unknown subtask ${dep}`);
        return false;
      });

      return {
        key: subtask.id,
        description: subtask.description,
        taskType,
        dependsOn,
        metadata: { plan_id: subtask.id },
      };
    });
  }
}
