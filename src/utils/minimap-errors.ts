/**
 * Error taxonomy for the minimap pipeline
 */

export interface MinimapErrorDetails {
  /** File path of the input, or "stdin". */
  source: string;
  language?: string;
  cause?: unknown;
  suggestion?: string;
}

export const ERROR_CODES = {
  UNKNOWN_LANGUAGE: "UNKNOWN_LANGUAGE",
  UNDETERMINED_LANGUAGE: "UNDETERMINED_LANGUAGE",
  CLASSIFIER_FAILURE: "CLASSIFIER_FAILURE",
  UNREADABLE_INPUT: "UNREADABLE_INPUT",
  BROKEN_OUTPUT_PIPE: "BROKEN_OUTPUT_PIPE",
  INVALID_OPTION: "INVALID_OPTION",
  INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class MinimapError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details: MinimapErrorDetails,
  ) {
    super(message);
    this.name = "MinimapError";
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      source: this.details.source,
      language: this.details.language,
      suggestion: this.details.suggestion,
    };
  }
}

export function isMinimapError(
  error: unknown,
  code?: ErrorCode,
): error is MinimapError {
  return (
    error instanceof MinimapError && (code === undefined || error.code === code)
  );
}

/**
 * Get a short cause description for an error code
 */
export function getErrorMessage(
  code: ErrorCode,
  details: MinimapErrorDetails,
): string {
  switch (code) {
    case ERROR_CODES.UNKNOWN_LANGUAGE:
      return `unknown language "${details.language ?? ""}"`;
    case ERROR_CODES.UNDETERMINED_LANGUAGE:
      return "could not determine language";
    case ERROR_CODES.CLASSIFIER_FAILURE:
      return `failed to highlight as ${details.language ?? "unknown"}`;
    case ERROR_CODES.UNREADABLE_INPUT:
      return `cannot read input: ${describeCause(details.cause)}`;
    case ERROR_CODES.BROKEN_OUTPUT_PIPE:
      return "output closed";
    case ERROR_CODES.INVALID_OPTION:
      return `invalid option: ${describeCause(details.cause)}`;
    case ERROR_CODES.INVALID_CONFIG:
      return `invalid configuration: ${describeCause(details.cause)}`;
  }
}

export function createMinimapError(
  code: ErrorCode,
  details: MinimapErrorDetails,
): MinimapError {
  return new MinimapError(code, getErrorMessage(code, details), details);
}

/**
 * One-line, user-facing form: `code-minimap: <source>: <cause>`
 */
export function formatErrorForUser(error: MinimapError): string {
  const suggestion = error.details.suggestion
    ? ` (${error.details.suggestion})`
    : "";
  return `code-minimap: ${error.details.source}: ${error.message}${suggestion}`;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    if ("code" in cause && typeof cause.code === "string") {
      switch (cause.code) {
        case "ENOENT":
          return "no such file or directory";
        case "EACCES":
        case "EPERM":
          return "permission denied";
        case "EISDIR":
          return "is a directory";
      }
    }
    return cause.message;
  }
  return String(cause);
}
