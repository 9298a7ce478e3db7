/**
 * Unit tests for output rendering and timing metrics
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Frame } from "@castra/core";
import { displayKey, frameRows, printJson, printLines } from "../src/lib/render.js";
import { formatMetric, withTiming } from "../src/lib/telemetry.js";
import type { CliIO } from "../src/lib/io.js";

function capture(): { io: CliIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { io: { stdout: (t) => out.push(t), stderr: (t) => err.push(t) }, out, err };
}

describe("render", () => {
  it("should print bigints as decimal strings", () => {
    const { io, out } = capture();
    printJson(io, { n: 12n, list: [1n] }, { raw: true });
    expect(out).toEqual(['{"n":"12","list":["1"]}\n']);
  });

  it("should pretty-print unless raw", () => {
    const { io, out } = capture();
    printJson(io, { a: 1 });
    expect(out).toEqual(['{\n  "a": 1\n}\n']);
  });

  it("should print one line per entry", () => {
    const { io, out } = capture();
    printLines(io, ["a", "b"]);
    expect(out.join("")).toBe("a\nb\n");
  });

  it("should render datetime keys in ISO-8601", () => {
    const frame = Frame.from({
      index: { dtype: "datetime", values: new BigInt64Array([0n]) },
      columns: { v: new Int32Array([7]) },
    });
    expect(frameRows(frame)).toEqual([{ index: "1970-01-01T00:00:00.000Z", v: 7 }]);
  });

  it("should leave integer keys as they are", () => {
    const frame = Frame.from({ index: new Int32Array([3]), columns: { v: ["x"] } });
    expect(frameRows(frame, "key")).toEqual([{ key: 3, v: "x" }]);
  });

  it("should format display keys", () => {
    expect(displayKey("datetime", 1000n)).toBe("1970-01-01T00:00:01.000Z");
    expect(displayKey("int64", 5n)).toBe("5");
    expect(displayKey("int32", null)).toBeNull();
    expect(displayKey("int32", undefined)).toBeNull();
  });
});

describe("telemetry", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should format metric lines without newlines", () => {
    expect(formatMetric("query", { rows: 3, note: "a\nb" })).toBe("metric query rows=3 note=a b\n");
  });

  it("should write timing only when verbose", async () => {
    vi.spyOn(Date, "now").mockReturnValueOnce(100).mockReturnValueOnce(142);
    const verbose = capture();
    await expect(withTiming("info", { io: verbose.io, verbose: true }, async () => "ok")).resolves.toBe("ok");
    expect(verbose.err).toEqual(["metric info duration_ms=42 success=true\n"]);

    const quiet = capture();
    await withTiming("info", { io: quiet.io, verbose: false }, async () => "ok");
    expect(quiet.err).toEqual([]);
  });

  it("should record failures and rethrow", async () => {
    vi.spyOn(Date, "now").mockReturnValueOnce(0).mockReturnValueOnce(5);
    const { io, err } = capture();
    await expect(
      withTiming("drop", { io, verbose: true }, async () => {
        throw new Error("nope");
      })
    ).rejects.toThrow("nope");
    expect(err).toEqual(["metric drop duration_ms=5 success=false\n"]);
  });
});
