/**
 * I/O helpers for CLI
 */

/**
 * Destination for command output
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Output bound to the process streams
 */
export const processIO: CliIO = {
  stdout: writeStdout,
  stderr: writeStderr,
};

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
