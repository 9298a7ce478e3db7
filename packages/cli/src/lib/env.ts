/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left as they are
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the store directory
 * Priority: CLI option > CASTRA_ROOT env var > current directory
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.CASTRA_ROOT ?? ".";
  return path.resolve(expandTilde(root));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(flag?: boolean): boolean {
  return flag === true || process.env.CASTRA_CLI_DEBUG === "1";
}
