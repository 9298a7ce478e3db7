/**
 * Frame builders for tests
 */

import { Frame } from "@castra/core";

const LABELS = ["alpha", "beta", "gamma", "delta"];

/**
 * Frame keyed by the integers [start, end) with an int32 index
 *
 * Columns: `x` (int32, equal to the key), `y` (text label cycling through
 * alpha/beta/gamma/delta by key), `z` (float64, key / 2).
 */
export function rangeFrame(start: number, end: number): Frame {
  const keys = Array.from({ length: end - start }, (_, i) => start + i);
  return Frame.from({
    index: Int32Array.from(keys),
    columns: {
      x: Int32Array.from(keys),
      y: keys.map((k) => labelFor(k)),
      z: Float64Array.from(keys, (k) => k / 2),
    },
  });
}

/**
 * Label `rangeFrame` stores in column `y` for a key
 */
export function labelFor(key: number): string {
  return LABELS[key % LABELS.length];
}
