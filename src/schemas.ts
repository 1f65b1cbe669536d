import { z } from "zod";
import { ValidationError } from "./errors.js";
import { TASK_STATUSES } from "./workflow/types.js";

/** Parse `data` with `schema` or throw a ValidationError listing every issue. */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${what}: ${msg}`);
  }
  return result.data;
}

const PlanIdSchema = z.union([z.string().min(1), z.number()]).transform((id) => String(id));

export const PlannerSubtaskSchema = z.object({
  id: PlanIdSchema,
  description: z.string().min(1),
  task_type: z.string().min(1).default("general_task"),
  dependencies: z.array(PlanIdSchema).default([]),
});

export const PlannerResponseSchema = z.object({
  main_task: z.string().optional(),
  subtasks: z.array(PlannerSubtaskSchema).min(1, "plan contains no subtasks"),
});

export type PlannerSubtask = z.infer<typeof PlannerSubtaskSchema>;
export type PlannerResponse = z.infer<typeof PlannerResponseSchema>;

export const TaskResultSchema = z.object({
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
  artifacts: z.record(z.unknown()).default({}),
});

export const TaskRecordSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  taskType: z.string().min(1),
  status: z.enum(TASK_STATUSES),
  dependencies: z.array(z.string()),
  result: TaskResultSchema.optional(),
  createdAt: z.number(),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export const WorkflowRowSchema = z.object({
  workflow_id: z.string(),
  description: z.string(),
  created_at: z.number(),
});

export const TaskRowSchema = z.object({
  data: z.string(),
});

/** Body an HTTP handler endpoint may answer with. */
export const HandlerOutcomeSchema = z.object({
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

export const CompletionResponseSchema = z.object({
  text: z.string(),
});

export const FileCreationResultSchema = z.object({
  filename: z.string().optional(),
  file_type: z.string().optional(),
  content_preview: z.string().optional(),
});

export const WebBrowsingResultSchema = z.object({
  filename: z.string().optional(),
  headlines: z.array(z.unknown()).default([]),
  information: z.array(z.unknown()).default([]),
  url: z.string().optional(),
});

export const ImageAnalysisResultSchema = z.object({
  analysis: z.unknown().optional(),
  image_path: z.string().optional(),
});
