import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parseOrThrow } from "../schemas.js";
import type { TaskType } from "../workflow/types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_KEYWORDS_PATH = join(__dirname, "..", "..", "data", "classifier-keywords.json");

export type ClassificationInput = {
  /** The task's own description, without upstream artifacts. */
  description: string;
  taskType: TaskType;
  /** Error text of a failed attempt, when classifying after a failure. */
  failure?: string;
};

export type Classification = {
  taskType: TaskType;
  /** 0..1 */
  confidence: number;
  classifier: string;
  matched: string[];
  /** The subset of `matched` found in the failure text. */
  failureMatched: string[];
};

export interface TaskClassifier {
  readonly name: string;
  classify(input: ClassificationInput): Classification | undefined;
}

export type KeywordClassifierOptions = {
  taskType: TaskType;
  name?: string;
  descriptionKeywords: string[];
  failureKeywords?: string[];
  /** Confidence contributed by a description match (default 0.6). */
  descriptionWeight?: number;
  /** Confidence contributed by a failure-text match (default 0.3). */
  failureWeight?: number;
  /** Confidence contributed by the task already carrying this type (default 0.3). */
  tagWeight?: number;
};

/**
 * Votes for one task type when its keywords show up in the description or
 * the failure text. A task already tagged with the type adds to a vote but
 * never casts one alone.
 */
export class KeywordClassifier implements TaskClassifier {
  readonly name: string;
  readonly taskType: TaskType;

  private descriptionKeywords: string[];
  private failureKeywords: string[];
  private descriptionWeight: number;
  private failureWeight: number;
  private tagWeight: number;

  constructor(opts: KeywordClassifierOptions) {
    this.taskType = opts.taskType;
    this.name = opts.name ?? `keywords:${opts.taskType}`;
    this.descriptionKeywords = opts.descriptionKeywords.map((k) => k.toLowerCase());
    this.failureKeywords = (opts.failureKeywords ?? []).map((k) => k.toLowerCase());
    this.descriptionWeight = opts.descriptionWeight ?? 0.6;
    this.failureWeight = opts.failureWeight ?? 0.3;
    this.tagWeight = opts.tagWeight ?? 0.3;
  }

  classify(input: ClassificationInput): Classification | undefined {
    const description = input.description.toLowerCase();
    const failure = input.failure?.toLowerCase();
    const inDescription = this.descriptionKeywords.filter((k) => description.includes(k));
    const inFailure = failure === undefined ? [] : this.failureKeywords.filter((k) => failure.includes(k));

    let confidence = 0;
    if (inDescription.length > 0) confidence += this.descriptionWeight;
    if (inFailure.length > 0) confidence += this.failureWeight;
    if (confidence === 0) return undefined;
    if (input.taskType === this.taskType) confidence += this.tagWeight;

    return {
      taskType: this.taskType,
      confidence: Math.min(1, confidence),
      classifier: this.name,
      matched: [...inDescription, ...inFailure],
      failureMatched: inFailure,
    };
  }
}

/** Runs classifiers in order; results are ranked by confidence, ties keep chain order. */
export class ClassifierChain {
  private classifiers: TaskClassifier[];

  constructor(classifiers: TaskClassifier[]) {
    this.classifiers = [...classifiers];
  }

  get size(): number {
    return this.classifiers.length;
  }

  rank(input: ClassificationInput): Classification[] {
    const votes: Classification[] = [];
    for (const classifier of this.classifiers) {
      const vote = classifier.classify(input);
      if (vote) votes.push(vote);
    }
    return votes.sort((a, b) => b.confidence - a.confidence);
  }
}

const KeywordFileSchema = z.record(
  z.object({
    description: z.array(z.string()),
    failure: z.array(z.string()).default([]),
  }),
);

/** One keyword classifier per task type listed in the keyword file, in file order. */
export function loadKeywordClassifiers(path: string = DEFAULT_KEYWORDS_PATH): KeywordClassifier[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const entries = parseOrThrow(KeywordFileSchema, raw, `classifier keywords in ${path}`);
  return Object.entries(entries).map(
    ([taskType, keywords]) =>
      new KeywordClassifier({
        taskType,
        descriptionKeywords: keywords.description,
        failureKeywords: keywords.failure,
      }),
  );
}

export function defaultClassifierChain(): ClassifierChain {
  return new ClassifierChain(loadKeywordClassifiers());
}
