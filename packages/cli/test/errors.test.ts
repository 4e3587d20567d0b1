/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { DuplicateElementError, EmptyContainerError, InvalidOptionError } from "@prioset/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("duplicates", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map DuplicateElementError to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new DuplicateElementError("a"))).toBe(2);
    });

    it("should map other SDK errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new EmptyContainerError("peek"))).toBe(1);
      expect(mapSdkErrorToExitCode(new InvalidOptionError("arity", "too small"))).toBe(1);
    });

    it("should use the exit code of a CliError", () => {
      expect(mapSdkErrorToExitCode(new CliError("custom", { exitCode: 3 }))).toBe(3);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      expect(formatCliError(new Error("test error"))).toBe("test error");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new CliError("wrapper", { cause: new Error("underlying") });

      const formatted = formatCliError(err, true);
      expect(formatted.split("\n")[1]).toBe("  Cause: Error: underlying");
    });

    it("should include stack in verbose mode", () => {
      const formatted = formatCliError(new Error("test"), true);
      expect(formatted).toContain("Error: test\n    at ");
    });

    it("should not include cause or stack in non-verbose mode", () => {
      const err = new CliError("wrapper", { cause: new Error("underlying") });
      expect(formatCliError(err, false)).toBe("wrapper");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
