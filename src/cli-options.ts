import type { Command } from "commander";
import { configure } from "./config.js";
import { setLogLevel } from "./utils/logger.js";

export type GlobalOptions = {
  db?: string;
  debug?: boolean;
};

/** Program-level options, whether given before or after the subcommand. */
export function globalOptions(actionCmd: Command): GlobalOptions {
  return actionCmd.optsWithGlobals<GlobalOptions>();
}

export function applyGlobalOptions(opts: GlobalOptions): void {
  if (opts.debug) setLogLevel("debug");
  if (opts.db) configure({ storage: { dbPath: opts.db } });
}
