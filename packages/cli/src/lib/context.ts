/**
 * Options shared by every command
 */

import type { Command } from "commander";
import { resolveRoot, isVerbose } from "./env.js";
import type { CliIO } from "./io.js";

export type GlobalOptions = {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export interface CommandContext {
  io: CliIO;
  root: string;
  verbose: boolean;
  quiet: boolean;
}

/**
 * Resolve the global options of `program` for a command run
 */
export function commandContext(program: Command, io: CliIO): CommandContext {
  const opts = program.opts<GlobalOptions>();
  return {
    io,
    root: resolveRoot(opts.root),
    verbose: isVerbose(opts.verbose),
    quiet: opts.quiet === true,
  };
}
