/**
 * Integration tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import {
  createTempStoreRoot,
  labelFor,
  parseJsonOutput,
  rangeFrame,
  removeDir,
  runCli,
  withTempStore,
} from "@castra/testkit";
import { Castra, Frame } from "@castra/core";
import { run } from "../src/program.js";

describe("castra CLI", () => {
  let parent: string;
  let root: string;

  beforeEach(async () => {
    parent = await createTempStoreRoot("castra-cli-");
    root = join(parent, "store");
    const store = await Castra.open({ path: root, template: rangeFrame(0, 0), categories: ["y"] });
    await store.extend(rangeFrame(0, 10));
    await store.extend(rangeFrame(10, 20));
    await store.close();
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await removeDir(parent);
  });

  describe("info", () => {
    it("should describe the store", async () => {
      const result = await runCli(run, ["--root", root, "info"]);

      expect(result.exitCode).toBe(0);
      expect(result.stderr).toBe("");
      expect(parseJsonOutput(result.stdout)).toEqual({
        path: root,
        columns: ["x", "y", "z"],
        dtypes: { x: "int32", y: "category", z: "float64" },
        indexDType: "int32",
        partitions: 2,
        minimum: "0",
        maximum: "19",
        categories: { y: 4 },
      });
    });

    it("should leave the index metadata untouched", async () => {
      const before = await stat(join(root, "meta", "partitions"));
      await runCli(run, ["--root", root, "info"]);
      await runCli(run, ["--root", root, "query", "--start", "3", "--stop", "4"]);
      const after = await stat(join(root, "meta", "partitions"));
      expect(after.ino).toBe(before.ino);
      expect(after.mtimeMs).toBe(before.mtimeMs);
    });

    it("should read the root from CASTRA_ROOT", async () => {
      vi.stubEnv("CASTRA_ROOT", root);
      const result = await runCli(run, ["info", "--raw"]);
      expect(result.exitCode).toBe(0);
      expect(result.stdout.split("\n")).toHaveLength(2);
    });

    it("should exit with 2 when no store exists", async () => {
      const missing = join(parent, "missing");
      const result = await runCli(run, ["--root", missing, "info"]);
      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe(`Error: No Castra store at ${missing}\n`);
    });

    it("should write a timing metric when verbose", async () => {
      const result = await runCli(run, ["--root", root, "--verbose", "info"]);
      expect(result.stderr).toMatch(/^metric cli\.info duration_ms=\d+ success=true\n$/);
    });
  });

  describe("query", () => {
    it("should print rows within inclusive bounds", async () => {
      const result = await runCli(run, ["--root", root, "query", "--start", "3", "--stop", "5", "--raw"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(
        '[{"index":3,"x":3,"y":"delta","z":1.5},{"index":4,"x":4,"y":"alpha","z":2},{"index":5,"x":5,"y":"beta","z":2.5}]\n'
      );
    });

    it("should span partitions and honour --columns and --limit", async () => {
      const result = await runCli(run, [
        "--root",
        root,
        "query",
        "--start",
        "8",
        "--stop",
        "15",
        "--columns",
        "y",
        "--limit",
        "3",
      ]);

      expect(parseJsonOutput(result.stdout)).toEqual([
        { index: 8, y: labelFor(8) },
        { index: 9, y: labelFor(9) },
        { index: 10, y: labelFor(10) },
      ]);
    });

    it("should print datetime keys in ISO-8601", async () => {
      const hours = (from: number, to: number): Frame =>
        Frame.from({
          index: {
            dtype: "datetime",
            values: BigInt64Array.from({ length: to - from }, (_, i) => BigInt(Date.UTC(2024, 0, 1, from + i))),
          },
          columns: { v: Float64Array.from({ length: to - from }, (_, i) => from + i) },
        });

      await withTempStore({ template: hours(0, 0) }, async (store, storeRoot) => {
        await store.extend(hours(0, 4));
        await store.close();

        const result = await runCli(run, [
          "--root",
          storeRoot,
          "query",
          "--start",
          "2024-01-01T01:00:00Z",
          "--stop",
          "2024-01-01T02:00:00Z",
          "--raw",
        ]);
        expect(result.stdout).toBe(
          '[{"index":"2024-01-01T01:00:00.000Z","v":1},{"index":"2024-01-01T02:00:00.000Z","v":2}]\n'
        );
      });
    });

    it("should print an empty list for an uncovered range", async () => {
      const result = await runCli(run, ["--root", root, "query", "--start", "100", "--raw"]);
      expect(result.stdout).toBe("[]\n");
    });

    it("should reject an unknown column", async () => {
      const result = await runCli(run, ["--root", root, "query", "--columns", "nope"]);
      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe('Error: [E_SCHEMA] Unknown column "nope"\n');
    });

    it("should reject an invalid --limit before opening the store", async () => {
      const result = await runCli(run, ["--root", root, "query", "--limit", "abc"]);
      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("--limit must be a non-negative integer");
    });
  });

  describe("partitions", () => {
    it("should list partition names", async () => {
      const result = await runCli(run, ["--root", root, "partitions", "list"]);
      expect(result.stdout).toBe("0--9\n10--19\n");
    });

    it("should list names with key ranges as JSON", async () => {
      const result = await runCli(run, ["--root", root, "partitions", "list", "--json"]);
      expect(parseJsonOutput(result.stdout)).toEqual([
        { name: "0--9", minKey: "0", maxKey: "9" },
        { name: "10--19", minKey: "10", maxKey: "19" },
      ]);
    });

    it("should print divisions", async () => {
      const result = await runCli(run, ["--root", root, "partitions", "divisions"]);
      expect(result.stdout).toBe('["0","9","19"]\n');
    });

    it("should show one partition with values or codes", async () => {
      const values = await runCli(run, [
        "--root",
        root,
        "partitions",
        "show",
        "10--19",
        "--columns",
        "y",
        "--limit",
        "2",
        "--raw",
      ]);
      expect(values.stdout).toBe('[{"index":10,"y":"gamma"},{"index":11,"y":"delta"}]\n');

      const codes = await runCli(run, [
        "--root",
        root,
        "partitions",
        "show",
        "10--19",
        "--columns",
        "y",
        "--limit",
        "2",
        "--codes",
        "--raw",
      ]);
      expect(codes.stdout).toBe('[{"index":10,"y":2},{"index":11,"y":3}]\n');
    });

    it("should exit with 2 for an unknown partition", async () => {
      const result = await runCli(run, ["--root", root, "partitions", "show", "99--99"]);
      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe("Error: [E_PARTITION] Partition not found: 99--99\n");
    });
  });

  describe("drop", () => {
    it("should require --force without a terminal", async () => {
      const result = await runCli(run, ["--root", root, "drop"]);
      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Use --force to confirm dropping in non-interactive mode\n");
      expect((await stat(root)).isDirectory()).toBe(true);
    });

    it("should remove the store with --force", async () => {
      const result = await runCli(run, ["--root", root, "drop", "--force"]);
      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(`Dropped ${root}\n`);
      await expect(stat(root)).rejects.toThrow();
    });

    it("should stay silent with --quiet", async () => {
      const result = await runCli(run, ["--root", root, "--quiet", "drop", "--force"]);
      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("");
    });
  });

  describe("program", () => {
    it("should print the version", async () => {
      let stdout = "";
      const exitCode = await run(["node", "castra", "--version"], {
        version: "1.2.3",
        io: {
          stdout: (text) => {
            stdout += text;
          },
          stderr: () => undefined,
        },
      });
      expect(exitCode).toBe(0);
      expect(stdout).toBe("1.2.3\n");
    });

    it("should fail on an unknown command", async () => {
      const result = await runCli(run, ["--root", root, "frobnicate"]);
      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("unknown command 'frobnicate'");
    });
  });
});
