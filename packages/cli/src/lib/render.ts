/**
 * Output rendering helpers
 */

import { formatKey, type DType, type Frame } from "@castra/core";
import type { CliIO } from "./io.js";

type Color = "red" | "green" | "yellow";

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Print JSON to stdout; bigints are written as decimal strings
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(io: CliIO, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw
    ? JSON.stringify(data, bigintReplacer)
    : JSON.stringify(data, bigintReplacer, 2);
  io.stdout(json + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(io: CliIO, lines: string[]): void {
  for (const line of lines) {
    io.stdout(line + "\n");
  }
}

/**
 * Rows of a frame as plain objects, with datetime keys in ISO-8601
 */
export function frameRows(frame: Frame, indexName = "index"): Array<Record<string, unknown>> {
  const rows = frame.toRows(indexName);
  if (frame.indexDType !== "datetime") {
    return rows;
  }
  return rows.map((row) => {
    const key = row[indexName];
    return typeof key === "bigint" ? { ...row, [indexName]: formatKey("datetime", key) } : row;
  });
}

/**
 * Key in display form, or null
 */
export function displayKey(dtype: DType, key: number | bigint | string | null | undefined): string | null {
  return key === null || key === undefined ? null : formatKey(dtype, key);
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
