import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const ConfigSchema = z.object({
  storage: z.object({
    dbPath: z.string().min(1),
  }),
  executor: z.object({
    strategy: z.enum(["serial", "pool"]),
    maxConcurrency: z.number().int().positive(),
    artifactPreviewLength: z.number().int().positive(),
    handlerTimeoutMs: z.number().int().positive(),
  }),
  retry: z.object({
    maxRetries: z.number().int().min(0),
    minConfidence: z.number().min(0).max(1),
    reclassifyBeforeDispatch: z.boolean(),
  }),
  planner: z.object({
    unresolvedDependencies: z.enum(["reject", "drop"]),
    responsePreviewLength: z.number().int().positive(),
  }),
  cli: z.object({
    descriptionWidth: z.number().int().positive(),
  }),
});

export type SchedulerConfig = z.infer<typeof ConfigSchema>;

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: SchedulerConfig = {
  storage: {
    dbPath: join(homedir(), ".taskweave", "workflows.db"),
  },
  executor: {
    strategy: "serial",
    maxConcurrency: 4,
    artifactPreviewLength: 100,
    handlerTimeoutMs: 120_000,
  },
  retry: {
    maxRetries: 1,
    minConfidence: 0.5,
    reclassifyBeforeDispatch: true,
  },
  planner: {
    unresolvedDependencies: "reject",
    responsePreviewLength: 500,
  },
  cli: {
    descriptionWidth: 60,
  },
};

let current: SchedulerConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMerge(existing, val) : val;
  }
  return result;
}

/** Override config values. Merges deeply with defaults and validates the result. */
export function configure(overrides: DeepPartial<SchedulerConfig>): void {
  const merged = ConfigSchema.safeParse(deepMerge(DEFAULTS, overrides));
  if (!merged.success) {
    const issues = merged.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  current = merged.data;
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<SchedulerConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<SchedulerConfig> = Object.freeze(structuredClone(DEFAULTS));
