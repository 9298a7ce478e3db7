/**
 * JSON formatting for metadata artifacts, dictionary logs and object columns
 *
 * Plain JSON has no bigints, no non-finite numbers and no negative zero. Those
 * values are written as one-key tagged objects and restored by {@link parseJson}:
 * - `{"$bigint": "<decimal>"}`
 * - `{"$number": "NaN" | "Infinity" | "-Infinity" | "-0"}`
 */

const BIGINT_TAG = "$bigint";
const NUMBER_TAG = "$number";

const SPECIAL_NUMBERS: ReadonlyMap<string, number> = new Map([
  ["NaN", Number.NaN],
  ["Infinity", Number.POSITIVE_INFINITY],
  ["-Infinity", Number.NEGATIVE_INFINITY],
  ["-0", -0],
]);

/**
 * Tagged form of a value JSON cannot represent, or the value itself
 */
function tagValue(value: unknown): unknown {
  if (typeof value === "bigint") {
    return { [BIGINT_TAG]: value.toString() };
  }
  if (typeof value === "number" && (!Number.isFinite(value) || Object.is(value, -0))) {
    return { [NUMBER_TAG]: Object.is(value, -0) ? "-0" : String(value) };
  }
  return value;
}

/**
 * Compact single-line JSON with tagged bigints and special numbers
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, item: unknown) => tagValue(item));
}

/**
 * Stable, deterministic JSON stringification with alphabetical key ordering
 *
 * Bigints and special numbers are tagged so they survive a round trip through
 * {@link parseJson}.
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const normalize = (input: unknown): unknown => {
    if (typeof input === "bigint" || typeof input === "number") {
      return tagValue(input);
    }
    if (input && typeof input === "object") {
      // Detect cycles
      if (seen.has(input)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(input);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(input)) {
          return input.map(normalize);
        }

        // Objects: sort keys and normalize values
        const entries = Object.entries(input).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        const out: Record<string, unknown> = {};
        for (const [k, v] of entries) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(input);
      }
    }
    return input;
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Parse JSON written by {@link stableStringify} or {@link toJson}, restoring tagged values
 */
export function parseJson(text: string): unknown {
  return JSON.parse(text, (_key, value: unknown) => {
    if (value === null || typeof value !== "object" || Array.isArray(value) || Object.keys(value).length !== 1) {
      return value;
    }
    const bigint = Object.getOwnPropertyDescriptor(value, BIGINT_TAG)?.value;
    if (typeof bigint === "string") {
      return BigInt(bigint);
    }
    const number = Object.getOwnPropertyDescriptor(value, NUMBER_TAG)?.value;
    if (typeof number === "string") {
      return SPECIAL_NUMBERS.get(number) ?? value;
    }
    return value;
  });
}
