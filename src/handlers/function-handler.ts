import { getConfig } from "../config.js";
import { HandlerError, errorMessage } from "../errors.js";
import { HandlerOutcomeSchema, parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { HandlerInput, HandlerOutcome, TaskHandler } from "./handler.js";

/**
 * Plain async function used as a handler. Returning a value counts as
 * success; returning a HandlerOutcome passes it through once validated.
 */
export type HandlerFunction = (description: string, input: HandlerInput) => Promise<unknown>;

export type FunctionHandlerOptions = {
  name: string;
  fn: HandlerFunction;
  description?: string;
  /** Timeout in ms (default: executor.handlerTimeoutMs) */
  timeout?: number;
};

/** Values carrying a `success` key are read as outcomes and must match the outcome shape. */
function toOutcome(value: unknown, handlerName: string): HandlerOutcome {
  if (typeof value !== "object" || value === null || !("success" in value)) {
    return { success: true, result: value };
  }
  return parseOrThrow(HandlerOutcomeSchema, value, `outcome from handler "${handlerName}"`);
}

export class FunctionHandler implements TaskHandler {
  readonly name: string;
  readonly description?: string;

  private fn: HandlerFunction;
  private timeout: number;

  constructor(opts: FunctionHandlerOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
    this.description = opts.description;
    this.timeout = opts.timeout ?? getConfig().executor.handlerTimeoutMs;
  }

  async handle(input: HandlerInput): Promise<HandlerOutcome> {
    const start = Date.now();
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      log.debug(`[${this.name}] Running function for task "${input.task.id}"`);

      const value = await Promise.race([
        this.fn(input.description, input),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new HandlerError("HANDLER_TIMEOUT", `Handler "${this.name}" timed out after ${this.timeout}ms`)),
            this.timeout,
          );
        }),
      ]);

      return toOutcome(value, this.name);
    } catch (err) {
      log.error(`[${this.name}] Task "${input.task.id}" failed`, {
        error: errorMessage(err),
        durationMs: Date.now() - start,
      });
      return { success: false, error: errorMessage(err) };
    } finally {
      clearTimeout(timer);
    }
  }
}
