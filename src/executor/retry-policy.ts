import type { Classification } from "../classify/classifier.js";
import { getConfig } from "../config.js";
import type { TaskType } from "../workflow/types.js";

/** Which types a task may be moved to, keyed by its current type. */
export type FallbackTable = Readonly<Record<string, readonly TaskType[]>>;

export type RetryPolicy = {
  /** Extra dispatches allowed after a failed one. */
  maxRetries: number;
  /** Lowest classifier confidence that may change a task's type. */
  minConfidence: number;
  /** Moves allowed after a failed attempt. A type listed under itself is re-dispatched unchanged. */
  fallbacks: FallbackTable;
  /** Moves allowed before the first dispatch, judged on the description alone. */
  preDispatch: FallbackTable;
};

export const DEFAULT_FALLBACKS: FallbackTable = {
  web_browsing: ["file_creation"],
  file_creation: ["file_creation"],
};

export const DEFAULT_PRE_DISPATCH: FallbackTable = {
  web_browsing: ["file_creation"],
};

export function retryPolicyFromConfig(overrides?: Partial<RetryPolicy>): RetryPolicy {
  const { retry } = getConfig();
  return {
    maxRetries: retry.maxRetries,
    minConfidence: retry.minConfidence,
    fallbacks: DEFAULT_FALLBACKS,
    preDispatch: retry.reclassifyBeforeDispatch ? DEFAULT_PRE_DISPATCH : {},
    ...overrides,
  };
}

export type ChooseOptions = {
  /** Only votes backed by the failure text count. Set when choosing after a failed attempt. */
  requireFailureMatch?: boolean;
};

/** Best-ranked vote the table allows for `current` and that clears the confidence bar. */
export function chooseTaskType(
  table: FallbackTable,
  minConfidence: number,
  current: TaskType,
  ranked: readonly Classification[],
  opts: ChooseOptions = {},
): Classification | undefined {
  const allowed = table[current] ?? [];
  return ranked.find(
    (vote) =>
      allowed.includes(vote.taskType) &&
      vote.confidence >= minConfidence &&
      (!opts.requireFailureMatch || vote.failureMatched.length > 0),
  );
}
