/**
 * packages/core/src/errors.ts — Error type for stepscroll.
 *
 * The easing and scheduling math never throws for well-formed input; this
 * error is reserved for invalid configuration and misuse of the public API.
 */

/**
 * Deterministic error codes for API misuse.
 * These are surfaced as ScrollError instances.
 */
export type ScrollErrorCode =
  | "SCROLL_INVALID_CONFIG"
  | "SCROLL_INVALID_ARGUMENT"
  | "SCROLL_DISPOSED"
  | "SCROLL_DUPLICATE_TRIGGER";

/**
 * Error class for all stepscroll API violations.
 * The `code` property identifies the specific violation.
 */
export class ScrollError extends Error {
  override readonly name = "ScrollError";
  readonly code: ScrollErrorCode;

  constructor(code: ScrollErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScrollError);
    }
  }
}
