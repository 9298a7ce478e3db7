/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import {
  ColumnFileNotFoundError,
  ConfigurationError,
  KeyOrderError,
  PartitionNotFoundError,
} from "@castra/core";
import { CliError, formatCliError, mapErrorToExitCode } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      expect(new CliError("not found", { exitCode: 2 }).exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      expect(new CliError("wrapper", { cause }).cause).toBe(cause);
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should map missing partitions and column files to exit code 2", () => {
      expect(mapErrorToExitCode(new PartitionNotFoundError("0--9"))).toBe(2);
      expect(mapErrorToExitCode(new ColumnFileNotFoundError("/data/0--9/x"))).toBe(2);
    });

    it("should map other store errors to exit code 1", () => {
      expect(mapErrorToExitCode(new ConfigurationError("bad"))).toBe(1);
      expect(mapErrorToExitCode(new KeyOrderError("overlap"))).toBe(1);
    });

    it("should use the exit code carried by CLI and commander errors", () => {
      expect(mapErrorToExitCode(new CliError("x", { exitCode: 2 }))).toBe(2);
      expect(mapErrorToExitCode(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
    });

    it("should default to exit code 1", () => {
      expect(mapErrorToExitCode(new Error("boom"))).toBe(1);
      expect(mapErrorToExitCode("string error")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should prefix store errors with their code", () => {
      expect(formatCliError(new PartitionNotFoundError("0--9"))).toBe("[E_PARTITION] Partition not found: 0--9");
    });

    it("should keep plain messages", () => {
      expect(formatCliError(new Error("simple"))).toBe("simple");
      expect(formatCliError(42)).toBe("42");
    });

    it("should truncate very long messages", () => {
      const message = formatCliError(new Error("x".repeat(2500)));
      expect(message).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include the cause when verbose", () => {
      const err = new Error("outer", { cause: new Error("inner") });
      expect(formatCliError(err, true)).toMatch(/^outer\n {2}Cause: inner\n/);
      expect(formatCliError(err, false)).toBe("outer");
    });
  });
});
