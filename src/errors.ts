/**
 * rowscroll - Errors
 * Precondition violations raised when the host misuses the layout
 */

import { LOG_PREFIX } from "./constants";

/**
 * Which precondition was violated
 */
export type PreconditionCode =
  | "EMPTY_ROW_SCROLL_REGION"
  | "INVALID_ITEM_COUNT"
  | "UNKNOWN_ROW"
  | "INVALID_CONFIG";

/**
 * Programmer error: the host asked for something the layout cannot produce.
 * Never caught inside the library.
 */
export class PreconditionError extends Error {
  readonly code: PreconditionCode;

  constructor(code: PreconditionCode, message: string) {
    super(`${LOG_PREFIX} ${message}`);
    this.name = "PreconditionError";
    this.code = code;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PreconditionError);
    }
  }

  /**
   * Check if this is a specific precondition
   */
  is(code: PreconditionCode): boolean {
    return this.code === code;
  }
}

/**
 * Type guard for PreconditionError, optionally narrowed to one code
 */
export const isPreconditionError = (
  error: unknown,
  code?: PreconditionCode,
): error is PreconditionError =>
  error instanceof PreconditionError && (code === undefined || error.is(code));
