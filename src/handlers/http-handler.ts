import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { HandlerOutcomeSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { HandlerInput, HandlerOutcome, TaskHandler } from "./handler.js";

export type HttpHandlerOptions = {
  name: string;
  url: string;
  headers?: Record<string, string>;
  description?: string;
  /** Timeout in ms (default: executor.handlerTimeoutMs) */
  timeout?: number;
};

/**
 * POSTs `{ taskId, taskType, description, artifacts }` to an endpoint.
 * A JSON body shaped like `{ success, result?, error? }` is taken as the
 * outcome; any other 2xx body is a successful result.
 */
export class HttpHandler implements TaskHandler {
  readonly name: string;
  readonly description?: string;

  private url: string;
  private headers: Record<string, string>;
  private timeout: number;

  constructor(opts: HttpHandlerOptions) {
    this.name = opts.name;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.description = opts.description;
    this.timeout = opts.timeout ?? getConfig().executor.handlerTimeoutMs;
  }

  async handle(input: HandlerInput): Promise<HandlerOutcome> {
    const start = Date.now();
    try {
      log.debug(`[${this.name}] Calling ${this.url} for task "${input.task.id}"`);

      const res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({
          taskId: input.task.id,
          taskType: input.taskType,
          description: input.description,
          artifacts: input.artifacts,
        }),
        signal: AbortSignal.timeout(this.timeout),
      });

      const body = await res.text();
      if (!res.ok) {
        return { success: false, error: `HTTP ${res.status}: ${body.slice(0, 500)}` };
      }
      return parseBody(body);
    } catch (err) {
      const isTimeout = err instanceof Error && err.name === "TimeoutError";
      const error = isTimeout ? `Handler "${this.name}" timed out after ${this.timeout}ms` : errorMessage(err);
      log.error(`[${this.name}] Task "${input.task.id}" failed`, { error, durationMs: Date.now() - start });
      return { success: false, error };
    }
  }
}

function parseBody(body: string): HandlerOutcome {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { success: true, result: body };
  }
  const outcome = HandlerOutcomeSchema.safeParse(json);
  return outcome.success ? outcome.data : { success: true, result: json };
}
