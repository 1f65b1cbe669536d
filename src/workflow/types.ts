export const BUILTIN_TASK_TYPES = [
  "file_creation",
  "web_browsing",
  "image_analysis",
  "image_search",
  "file_organization",
  "file_deletion",
  "general_task",
] as const;

export type BuiltinTaskType = (typeof BUILTIN_TASK_TYPES)[number];

/** Handler tag. Built-in tags are what the planner may emit; registries accept any non-empty tag. */
export type TaskType = BuiltinTaskType | (string & {});

export const DEFAULT_TASK_TYPE: BuiltinTaskType = "general_task";

export const TASK_STATUSES = ["pending", "blocked", "in_progress", "completed", "failed"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type Artifacts = Record<string, unknown>;

export type TaskResult = {
  success: boolean;
  result?: unknown;
  /** Present iff `success` is false. */
  error?: string;
  artifacts: Artifacts;
};

export type Task = {
  id: string;
  description: string;
  taskType: TaskType;
  status: TaskStatus;
  dependencies: string[];
  result?: TaskResult;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  metadata: Record<string, unknown>;
};

export type WorkflowMeta = {
  id: string;
  description: string;
  createdAt: number;
};

export type OverallStatus = "pending" | "in_progress" | "completed" | "failed" | "partially_completed";

export type WorkflowStatus = {
  workflowId: string;
  totalTasks: number;
  counts: Record<TaskStatus, number>;
  completedTasks: number;
  failedTasks: number;
  /** Pending plus blocked. */
  pendingTasks: number;
  inProgressTasks: number;
  overallStatus: OverallStatus;
  progressPercentage: number;
};
