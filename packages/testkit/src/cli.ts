/**
 * CLI testing utilities
 */

/**
 * Output sink handed to the CLI under test
 */
export interface CapturedIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code */
  exitCode: number;
}

/**
 * Entry point of a CLI that reports its exit code instead of exiting
 */
export type CliRunner = (argv: string[], options: { io: CapturedIO }) => Promise<number>;

/**
 * Run a CLI in process, capturing everything it writes
 * @param run - CLI entry point
 * @param args - Command arguments (without the node and script entries)
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(run: CliRunner, args: string[]): Promise<CliResult> {
  let stdout = "";
  let stderr = "";
  const io: CapturedIO = {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
  };

  const exitCode = await run(["node", "castra", ...args], { io });
  return { stdout, stderr, exitCode };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
