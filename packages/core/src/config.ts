/**
 * packages/core/src/config.ts — Scroll configuration defaults and validation.
 */

import { isEasingName } from "./animation/easing.js";
import type { EasingName } from "./animation/types.js";
import { ScrollError } from "./errors.js";
import { type ScrollLogFn, resolveLog } from "./log.js";

export type ScrollConfig = Readonly<{
  /** Easing used when a run does not name one. */
  defaultEasing: EasingName;
  /** Duration of a full-page scroll in seconds. */
  pageDurationSeconds: number;
  /** Duration of a half-page scroll in seconds. */
  halfPageDurationSeconds: number;
  /** Duration of a line scroll in seconds. */
  lineDurationSeconds: number;
  /** Lines of overlap kept on screen by a full-page scroll. */
  nextScreenContextLines: number;
  /** Whether runs move the cursor along with the viewport by default. */
  moveCursor: boolean;
}>;

export type ScrollConfigInput = Partial<ScrollConfig>;

export const DEFAULT_SCROLL_CONFIG: ScrollConfig = Object.freeze({
  defaultEasing: "quadratic",
  pageDurationSeconds: 0.25,
  halfPageDurationSeconds: 0.15,
  lineDurationSeconds: 0.05,
  nextScreenContextLines: 2,
  moveCursor: true,
});

function invalidConfig(detail: string): ScrollError {
  return new ScrollError("SCROLL_INVALID_CONFIG", `Invalid scroll config: ${detail}`);
}

function readDuration(
  input: ScrollConfigInput,
  key: "pageDurationSeconds" | "halfPageDurationSeconds" | "lineDurationSeconds",
): number {
  const value: unknown = input[key];
  if (value === undefined) return DEFAULT_SCROLL_CONFIG[key];
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw invalidConfig(`${key} must be a finite number >= 0 (got ${String(value)})`);
  }
  return value;
}

/**
 * Apply defaults to a partial config and validate it.
 *
 * An unrecognized `defaultEasing` is kept: runs using it fall back to linear
 * curves. A warning is logged so the typo does not go unnoticed.
 */
export function normalizeScrollConfig(
  input: ScrollConfigInput | undefined,
  log?: ScrollLogFn,
): ScrollConfig {
  if (input === undefined) return DEFAULT_SCROLL_CONFIG;
  const emit = resolveLog(log);

  const easing: unknown = input.defaultEasing;
  if (easing !== undefined && !isEasingName(easing)) {
    emit({
      level: "warn",
      code: "SCROLL_UNKNOWN_EASING",
      message: `Unknown easing "${String(easing)}", falling back to linear curves`,
    });
  }

  const context: unknown = input.nextScreenContextLines;
  if (
    context !== undefined &&
    (typeof context !== "number" || !Number.isInteger(context) || context < 0)
  ) {
    throw invalidConfig(`nextScreenContextLines must be an integer >= 0 (got ${String(context)})`);
  }

  const moveCursor: unknown = input.moveCursor;
  if (moveCursor !== undefined && typeof moveCursor !== "boolean") {
    throw invalidConfig(`moveCursor must be a boolean (got ${String(moveCursor)})`);
  }

  return Object.freeze({
    defaultEasing: input.defaultEasing ?? DEFAULT_SCROLL_CONFIG.defaultEasing,
    pageDurationSeconds: readDuration(input, "pageDurationSeconds"),
    halfPageDurationSeconds: readDuration(input, "halfPageDurationSeconds"),
    lineDurationSeconds: readDuration(input, "lineDurationSeconds"),
    nextScreenContextLines:
      input.nextScreenContextLines ?? DEFAULT_SCROLL_CONFIG.nextScreenContextLines,
    moveCursor: input.moveCursor ?? DEFAULT_SCROLL_CONFIG.moveCursor,
  });
}
