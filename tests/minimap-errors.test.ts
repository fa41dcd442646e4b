import { describe, expect, test } from "vitest";
import {
  createMinimapError,
  describeCause,
  ERROR_CODES,
  formatErrorForUser,
  isMinimapError,
} from "../src/utils/minimap-errors.js";

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("minimap errors", () => {
  test("formats a user-facing line with the source", () => {
    const error = createMinimapError(ERROR_CODES.UNREADABLE_INPUT, {
      source: "missing.rs",
      cause: systemError("ENOENT", "ENOENT: no such file, open 'missing.rs'"),
    });
    expect(formatErrorForUser(error)).toBe(
      "code-minimap: missing.rs: cannot read input: no such file or directory",
    );
  });

  test("appends the suggestion", () => {
    const error = createMinimapError(ERROR_CODES.UNKNOWN_LANGUAGE, {
      source: "stdin",
      language: "klingon",
      suggestion: "try rs",
    });
    expect(formatErrorForUser(error)).toBe(
      'code-minimap: stdin: unknown language "klingon" (try rs)',
    );
  });

  test("describes common system errors", () => {
    expect(describeCause(systemError("EACCES", "x"))).toBe("permission denied");
    expect(describeCause(systemError("EISDIR", "x"))).toBe("is a directory");
    expect(describeCause(systemError("EIO", "i/o failed"))).toBe("i/o failed");
    expect(describeCause("plain reason")).toBe("plain reason");
  });

  test("narrows by code", () => {
    const error = createMinimapError(ERROR_CODES.BROKEN_OUTPUT_PIPE, {
      source: "stdout",
    });
    expect(isMinimapError(error)).toBe(true);
    expect(isMinimapError(error, ERROR_CODES.BROKEN_OUTPUT_PIPE)).toBe(true);
    expect(isMinimapError(error, ERROR_CODES.INVALID_OPTION)).toBe(false);
    expect(isMinimapError(new Error("x"))).toBe(false);
    expect(error.toJSON()).toMatchObject({
      code: "BROKEN_OUTPUT_PIPE",
      message: "output closed",
      source: "stdout",
    });
  });
});
