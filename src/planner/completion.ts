import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { CompletionResponseSchema } from "../schemas.js";
import { log } from "../utils/logger.js";

export type CompletionResult =
  | { success: true; text: string }
  | { success: false; error: string };

/** Text-completion backend the planner asks for a task breakdown. */
export interface CompletionService {
  complete(prompt: string, systemPrompt?: string): Promise<CompletionResult>;
}

export type CompletionFunction = (prompt: string, systemPrompt?: string) => Promise<string>;

/** Wraps an async function; a throw becomes a failed completion. */
export class FunctionCompletionService implements CompletionService {
  private fn: CompletionFunction;

  constructor(fn: CompletionFunction) {
    this.fn = fn;
  }

  async complete(prompt: string, systemPrompt?: string): Promise<CompletionResult> {
    try {
      return { success: true, text: await this.fn(prompt, systemPrompt) };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }
}

export type HttpCompletionServiceOptions = {
  url: string;
  headers?: Record<string, string>;
  /** Timeout in ms (default: executor.handlerTimeoutMs) */
  timeout?: number;
};

/** POSTs `{ prompt, systemPrompt }` and expects `{ text }` back. */
export class HttpCompletionService implements CompletionService {
  private url: string;
  private headers: Record<string, string>;
  private timeout: number;

  constructor(opts: HttpCompletionServiceOptions) {
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.timeout = opts.timeout ?? getConfig().executor.handlerTimeoutMs;
  }

  async complete(prompt: string, systemPrompt?: string): Promise<CompletionResult> {
    try {
      const res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({ prompt, systemPrompt }),
        signal: AbortSignal.timeout(this.timeout),
      });
      if (!res.ok) {
        const body = await res.text();
        return { success: false, error: `HTTP ${res.status}: ${body.slice(0, 200)}` };
      }
      const parsed = CompletionResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        return { success: false, error: "Completion response is missing a text field" };
      }
      return { success: true, text: parsed.data.text };
    } catch (err) {
      log.error(`Completion request to ${this.url} failed`, { error: errorMessage(err) });
      return { success: false, error: errorMessage(err) };
    }
  }
}
