/**
 * packages/core/src/animation/interpolate.ts — Primitive numeric helpers.
 */

/** Clamp a number into [0, 1]. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/** Convert a duration in seconds to a safe, non-negative millisecond value. */
export function secondsToDurationMs(seconds: number | undefined): number {
  if (seconds === undefined) return 0;
  if (!Number.isFinite(seconds)) return 0;
  return Math.max(0, seconds * 1000);
}
