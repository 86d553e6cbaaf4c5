/**
 * Error types for gridtext.
 *
 * Recoverable failures (invalid text, canvas writes) are returned as result
 * unions. Misuse and broken collaborator contracts throw GridTextError.
 */

/**
 * Deterministic error codes for all thrown violations.
 */
export type GridTextErrorCode =
  | "GT_INVALID_ARGUMENT"
  | "GT_INVALID_OPTIONS"
  | "GT_REENTRANT_CALL"
  | "GT_INVARIANT_VIOLATION";

/**
 * Error class for all thrown violations.
 * The `code` property identifies the specific violation.
 */
export class GridTextError extends Error {
  override readonly name = "GridTextError";
  readonly code: GridTextErrorCode;

  constructor(code: GridTextErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GridTextError);
    }
  }
}

export function throwCode(code: GridTextErrorCode, detail: string): never {
  throw new GridTextError(code, detail);
}
