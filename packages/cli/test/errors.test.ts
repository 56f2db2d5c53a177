/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import {
  IndexUnavailableError,
  InvalidArgumentError,
  InvalidDocumentError,
  StoreClosedError,
  StoreLockedError,
  StoreUnavailableError,
} from "@topicsearch/sdk";
import { CliError, EXIT_PARTIAL, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("partial", { exitCode: EXIT_PARTIAL });
      expect(err.exitCode).toBe(4);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map IndexUnavailableError to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new IndexUnavailableError("/idx", "no committed index"))).toBe(2);
    });

    it("should map store lifecycle errors to exit code 3", () => {
      expect(mapSdkErrorToExitCode(new StoreLockedError("/idx", 42))).toBe(3);
      expect(mapSdkErrorToExitCode(new StoreUnavailableError("/idx"))).toBe(3);
      expect(mapSdkErrorToExitCode(new StoreClosedError("/idx"))).toBe(3);
    });

    it("should map validation errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new InvalidArgumentError("maxResults", "must be >= 0"))).toBe(1);
      expect(mapSdkErrorToExitCode(new InvalidDocumentError("", "url must be a non-empty string"))).toBe(1);
    });

    it("should use the exit code carried by a CliError", () => {
      expect(mapSdkErrorToExitCode(new CliError("partial", { exitCode: 4 }))).toBe(4);
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
      const err = new Error("wrapper", { cause: new Error("underlying") });

      const formatted = formatCliError(err, true);
      expect(formatted.startsWith("wrapper\n  Cause: underlying\n")).toBe(true);
    });

    it("should not include cause or stack in non-verbose mode", () => {
      const err = new Error("wrapper", { cause: new Error("underlying") });
      expect(formatCliError(err, false)).toBe("wrapper");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
