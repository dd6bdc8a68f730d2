/**
 * packages/core/src/animation/easing.ts — Easing curves and step delay sampling.
 *
 * A scroll run moves one line per step. The delay before each step is the
 * difference of the inverse easing curve sampled at two neighbouring line
 * fractions, so the delays of a full run telescope to the configured duration
 * while their spacing follows the curve.
 */

import { clamp01 } from "./interpolate.js";
import type { EasingFunction, EasingName } from "./types.js";

/** Delay returned when there is nothing left to move. */
export const IDLE_STEP_DELAY_MS = 1000;

/** Shortest delay ever scheduled between two steps. */
export const MIN_STEP_DELAY_MS = 1;

const HALF_PI = Math.PI / 2;

const identity: EasingFunction = (t: number): number => t;

const EASING_PRESETS: Readonly<Record<EasingName, EasingFunction>> = Object.freeze({
  linear: identity,
  quadratic: (t: number): number => t * t,
  cubic: (t: number): number => 1 - (1 - t) ** 3,
  sine: (t: number): number => 1 - Math.cos(t * HALF_PI),
});

// Inverse curves map eased progress back to a line fraction.
const INVERSE_PRESETS: Readonly<Record<EasingName, EasingFunction>> = Object.freeze({
  linear: identity,
  quadratic: (x: number): number => 1 - Math.sqrt(1 - x),
  cubic: (x: number): number => 1 - Math.cbrt(1 - x),
  sine: (x: number): number => (2 * Math.asin(x)) / Math.PI,
});

export const EASING_NAMES: readonly EasingName[] = Object.freeze([
  "linear",
  "quadratic",
  "cubic",
  "sine",
]);

export function isEasingName(value: unknown): value is EasingName {
  return typeof value === "string" && (EASING_NAMES as readonly string[]).includes(value);
}

/** Resolve an easing name to its forward curve. Unknown names behave as linear. */
export function resolveEasing(name: EasingName | undefined): EasingFunction {
  if (!isEasingName(name)) return EASING_PRESETS.linear;
  return EASING_PRESETS[name];
}

/** Resolve an easing name to its inverse curve. Unknown names resolve to identity. */
export function resolveInverseEasing(name: EasingName | undefined): EasingFunction {
  if (!isEasingName(name)) return identity;
  return INVERSE_PRESETS[name];
}

/**
 * Delay in milliseconds before the step that leaves `remainingLines` to go.
 *
 * Linear runs space their steps uniformly over `totalLines - 1` intervals.
 * Other curves sample the inverse easing at the fractions before and after
 * the step. The result is always an integer of at least one millisecond.
 */
export function computeTimeStep(
  remainingLines: number,
  totalLines: number,
  durationMs: number,
  easing: EasingName,
): number {
  if (!(remainingLines >= 1)) return IDLE_STEP_DELAY_MS;
  const duration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;

  if (easing === "linear") {
    const intervals = Math.max(1, Math.abs(totalLines) - 1);
    return Math.max(MIN_STEP_DELAY_MS, Math.floor(duration / intervals));
  }

  const range = Math.max(1, Math.abs(totalLines));
  const inverse = resolveInverseEasing(easing);
  const x1 = clamp01((range - remainingLines) / range);
  const x2 = clamp01((range - remainingLines + 1) / range);
  return Math.max(MIN_STEP_DELAY_MS, Math.floor(duration * (inverse(x2) - inverse(x1))));
}

/**
 * Delays a scheduler arms for a run of `totalLines` lines, in order.
 *
 * The first line moves immediately and the run finishes on the last line,
 * so a run of N lines arms N - 1 timers.
 */
export function planStepDelays(
  totalLines: number,
  durationMs: number,
  easing: EasingName,
): readonly number[] {
  const range = Math.abs(Math.trunc(totalLines));
  const delays: number[] = [];
  for (let remaining = range - 1; remaining >= 1; remaining--) {
    delays.push(computeTimeStep(remaining, range, durationMs, easing));
  }
  return Object.freeze(delays);
}
