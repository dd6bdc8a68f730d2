/**
 * packages/core/src/animation/types.ts — Easing API types.
 */

/** Easing function input/output in [0..1]. */
export type EasingFunction = (t: number) => number;

/** Built-in easing curves a scroll run can be shaped with. */
export type EasingName = "linear" | "quadratic" | "cubic" | "sine";
