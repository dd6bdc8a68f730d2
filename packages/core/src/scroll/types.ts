/**
 * packages/core/src/scroll/types.ts — Scheduler collaborator contracts.
 *
 * The scheduler never touches an editor directly. Hosts implement these
 * interfaces to move the viewport, report input and run timers.
 */

import type { EasingName } from "../animation/types.js";

/** Performs unit movement and answers environment queries for the scheduler. */
export interface ScrollDriver {
  /** Move the viewport forward by `units` lines. */
  scrollForward(units: number): void;
  /** Move the viewport backward by `units` lines. */
  scrollBackward(units: number): void;
  /** Move the cursor by `delta` lines. Only called when `moveCursor` is set. */
  moveCursorLine?(delta: number): void;
  /** True when the user has typed ahead and the run should yield. */
  queryPendingInput(): boolean;
  /** Visible height of the viewport in lines. */
  queryWindowHeight(): number;
  /** Restore cursor visibility when a run finishes. */
  setCursorVisible?(visible: boolean): void;
}

/** Best-effort highlight bookkeeping owned by the host. */
export interface HighlightRefresher {
  notifyPostStep(): void;
  /** Drop transient highlight markers left behind by an interrupted run. */
  clearTransient?(): void;
}

/** Opaque token for one pending timer callback. */
export type TimerHandle = Readonly<{ id: number }>;

/**
 * One-shot timer primitive.
 *
 * `cancel` must guarantee the callback does not fire afterwards.
 */
export interface TimerHost {
  scheduleOnce(delayMs: number, callback: () => void): TimerHandle;
  cancel(handle: TimerHandle): void;
}

export type ScrollHooks<I = unknown> = Readonly<{
  /** Called once before the first step of a run. */
  pre?: (info: I | undefined) => void;
  /** Called once when a run finishes, whether it completed or was interrupted. */
  post?: (info: I | undefined) => void;
}>;

/** Options accepted by `startScroll`. */
export type ScrollOptions<I = unknown> = Readonly<{
  /** Total animation time in seconds. */
  durationSeconds: number;
  /** Easing curve. Defaults to the configured default easing. */
  easing?: EasingName;
  /** Move the cursor along with the viewport. Defaults to the configured value. */
  moveCursor?: boolean;
  /** Passed through unmodified to the pre and post hooks. */
  info?: I;
}>;

/** Options snapshot captured for a run, with defaults applied. */
export type ResolvedScrollOptions<I = unknown> = Readonly<{
  durationMs: number;
  easing: EasingName;
  moveCursor: boolean;
  info: I | undefined;
}>;

/** Read-only view of an active run. */
export type AnimationSnapshot = Readonly<{
  runId: number;
  totalLines: number;
  relativePosition: number;
}>;
