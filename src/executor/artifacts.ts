import type { z } from "zod";
import {
  FileCreationResultSchema,
  ImageAnalysisResultSchema,
  WebBrowsingResultSchema,
} from "../schemas.js";
import type { Artifacts, TaskType } from "../workflow/types.js";

export type ArtifactExtractor = (result: unknown) => Artifacts;

function fromSchema<T extends Record<string, unknown>>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ArtifactExtractor {
  return (result) => {
    const parsed = schema.safeParse(result);
    if (!parsed.success) return {};
    return Object.fromEntries(Object.entries(parsed.data).filter(([, v]) => v !== undefined));
  };
}

/** Named outputs pulled from a handler's raw result, per task type. */
export const DEFAULT_EXTRACTORS: Readonly<Record<string, ArtifactExtractor>> = {
  file_creation: fromSchema(FileCreationResultSchema),
  web_browsing: fromSchema(WebBrowsingResultSchema),
  image_analysis: fromSchema(ImageAnalysisResultSchema),
};

export function extractArtifacts(
  taskType: TaskType,
  result: unknown,
  extractors: Readonly<Record<string, ArtifactExtractor>> = DEFAULT_EXTRACTORS,
): Artifacts {
  const extractor = extractors[taskType];
  return extractor ? extractor(result) : {};
}

export const ARTIFACT_HEADER = "\n\nUse the following information from previous tasks:\n";

/** One `- key: value` line per artifact. Non-string values are JSON, cut to `maxLength`. */
export function renderArtifacts(artifacts: Artifacts, maxLength: number): string {
  let out = "";
  for (const [key, value] of Object.entries(artifacts)) {
    if (typeof value === "string") {
      out += `- ${key}: ${value}\n`;
      continue;
    }
    const text = JSON.stringify(value) ?? String(value);
    out += text.length > maxLength ? `- ${key}: ${text.slice(0, maxLength)}...\n` : `- ${key}: ${text}\n`;
  }
  return out;
}

/** The task's description with upstream artifacts appended, or unchanged when there are none. */
export function enhanceDescription(description: string, artifacts: Artifacts, maxLength: number): string {
  if (Object.keys(artifacts).length === 0) return description;
  return description + ARTIFACT_HEADER + renderArtifacts(artifacts, maxLength);
}
