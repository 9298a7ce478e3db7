/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} is too large`);
  }

  return parsed;
}

/**
 * Parse a comma-separated column list
 */
export function parseColumns(value: string): string[] {
  const columns = value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  if (columns.length === 0) {
    throw new InvalidArgumentError("--columns must name at least one column");
  }
  return [...new Set(columns)];
}
