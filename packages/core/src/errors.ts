/**
 * packages/core/src/errors.ts: Deterministic error codes.
 *
 * Absence (cache misses, hit-tests outside content) is never an error. These
 * codes cover invalid arguments and misuse of renderer state only.
 */

export type StyledTextErrorCode =
  | "STX_INVALID_PROPS"
  | "STX_INVALID_STATE"
  | "STX_REENTRANT_CALL"
  | "STX_STORAGE_BOUND";

/**
 * Error class for all deterministic violations.
 * The `code` property identifies the specific violation.
 */
export class StyledTextError extends Error {
  override readonly name = "StyledTextError";
  readonly code: StyledTextErrorCode;

  constructor(code: StyledTextErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StyledTextError);
    }
  }
}

export function invalidProps(detail: string): never {
  throw new StyledTextError("STX_INVALID_PROPS", detail);
}
