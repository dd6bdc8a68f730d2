/**
 * packages/core/src/scroll/scheduler.ts — Variable-step scroll animation scheduler.
 *
 * A run moves the viewport one line per step toward a signed target. The
 * first step executes synchronously inside `startScroll`; every later step is
 * a one-shot timer armed by the step before it, with a delay sampled from the
 * run's easing curve.
 *
 * Lifecycle: Idle -> Running -> Idle. A run ends by completing its last line
 * or by `interrupt()` (explicit, pending input, or a newer `startScroll`).
 * Both paths share one finalize routine, so the post hook fires exactly once
 * per run.
 *
 * Each run gets a fresh id. Timer callbacks carry the id they were armed for
 * and do nothing once a newer run (or no run) owns the scheduler, even when
 * the host's `cancel` did not stop them.
 */

import { computeTimeStep } from "../animation/easing.js";
import { secondsToDurationMs } from "../animation/interpolate.js";
import { type ScrollConfig, type ScrollConfigInput, normalizeScrollConfig } from "../config.js";
import { ScrollError } from "../errors.js";
import { type ScrollLogFn, resolveLog } from "../log.js";
import { createHookDispatcher } from "./hooks.js";
import { createInterruptMonitor } from "./interruptMonitor.js";
import type {
  AnimationSnapshot,
  HighlightRefresher,
  ResolvedScrollOptions,
  ScrollDriver,
  ScrollHooks,
  ScrollOptions,
  TimerHandle,
  TimerHost,
} from "./types.js";

export type ScrollSchedulerDeps<I = unknown> = Readonly<{
  driver: ScrollDriver;
  timer: TimerHost;
  highlight?: HighlightRefresher;
  hooks?: ScrollHooks<I>;
  config?: ScrollConfigInput;
  log?: ScrollLogFn;
}>;

export type ScrollScheduler<I = unknown> = Readonly<{
  /** Cancel any running animation, then animate `lines` lines (negative scrolls backward). */
  startScroll: (lines: number, options: ScrollOptions<I>) => void;
  /** Cancel the running animation, if any, and resync highlights. Idempotent. */
  interrupt: () => void;
  isRunning: () => boolean;
  /** Current run state, or null while idle. */
  snapshot: () => AnimationSnapshot | null;
  /** Interrupt and refuse further runs. */
  dispose: () => void;
  /** Normalized config the scheduler was created with. */
  config: ScrollConfig;
}>;

type AnimationState<I> = {
  readonly runId: number;
  readonly totalLines: number;
  relativePosition: number;
  readonly options: ResolvedScrollOptions<I>;
  interrupted: boolean;
  finalized: boolean;
  timerHandle: TimerHandle | null;
};

function resolveOptions<I>(
  options: ScrollOptions<I>,
  config: ScrollConfig,
): ResolvedScrollOptions<I> {
  return Object.freeze({
    durationMs: secondsToDurationMs(options.durationSeconds),
    easing: options.easing ?? config.defaultEasing,
    moveCursor: options.moveCursor ?? config.moveCursor,
    info: options.info,
  });
}

export function createScrollScheduler<I = unknown>(
  deps: ScrollSchedulerDeps<I>,
): ScrollScheduler<I> {
  const { driver, timer, highlight } = deps;
  const log = resolveLog(deps.log);
  const config = normalizeScrollConfig(deps.config, log);
  const hooks = createHookDispatcher(deps.hooks, log);

  let state: AnimationState<I> | null = null;
  let running = false;
  let lastRunId = 0;
  let disposed = false;

  const monitor = createInterruptMonitor({
    isActive: () => running,
    queryPendingInput: () => driver.queryPendingInput(),
    interrupt: () => interrupt(),
  });

  function cancelPending(current: AnimationState<I>): void {
    if (current.timerHandle !== null) {
      timer.cancel(current.timerHandle);
      current.timerHandle = null;
    }
  }

  function finalize(current: AnimationState<I>): void {
    if (current.finalized) return;
    current.finalized = true;
    cancelPending(current);
    if (state === current) {
      state = null;
      running = false;
    }
    log({
      level: "trace",
      code: current.interrupted ? "SCROLL_RUN_INTERRUPTED" : "SCROLL_RUN_COMPLETED",
      message: `run ended at ${String(current.relativePosition)}/${String(current.totalLines)}`,
      runId: current.runId,
    });
    driver.setCursorVisible?.(true);
    highlight?.notifyPostStep();
    hooks.post(current.options.info, current.runId);
  }

  function interrupt(): void {
    const current = state;
    running = false;
    if (current !== null) {
      cancelPending(current);
      current.interrupted = true;
      finalize(current);
    }
    highlight?.clearTransient?.();
    highlight?.notifyPostStep();
  }

  function runStep(runId: number): void {
    const current = state;
    if (current === null || current.runId !== runId || current.finalized) return;
    current.timerHandle = null;

    const remaining = current.totalLines - current.relativePosition;
    if (current.interrupted || monitor.check() || remaining === 0) {
      finalize(current);
      return;
    }

    const direction = Math.sign(remaining);
    if (direction > 0) {
      driver.scrollForward(1);
    } else {
      driver.scrollBackward(1);
    }
    if (current.options.moveCursor) {
      driver.moveCursorLine?.(direction);
    }
    current.relativePosition += direction;
    highlight?.notifyPostStep();

    const nextRemaining = current.totalLines - current.relativePosition;
    if (nextRemaining === 0) {
      // Last line moved: close the run now instead of arming an idle timer.
      runStep(runId);
      return;
    }

    const delayMs = computeTimeStep(
      Math.abs(nextRemaining),
      Math.abs(current.totalLines),
      current.options.durationMs,
      current.options.easing,
    );
    current.timerHandle = timer.scheduleOnce(delayMs, () => runStep(runId));
  }

  function startScroll(lines: number, options: ScrollOptions<I>): void {
    if (disposed) {
      throw new ScrollError("SCROLL_DISPOSED", "startScroll called on a disposed scheduler");
    }
    if (!Number.isFinite(lines)) {
      throw new ScrollError(
        "SCROLL_INVALID_ARGUMENT",
        `startScroll expects a finite line count (got ${String(lines)})`,
      );
    }

    // A post hook may start a chained run from inside the interrupt.
    while (state !== null) interrupt();
    const totalLines = Math.trunc(lines);
    if (totalLines === 0) return;

    lastRunId++;
    const current: AnimationState<I> = {
      runId: lastRunId,
      totalLines,
      relativePosition: 0,
      options: resolveOptions(options, config),
      interrupted: false,
      finalized: false,
      timerHandle: null,
    };
    state = current;
    log({
      level: "trace",
      code: "SCROLL_RUN_STARTED",
      message: `run of ${String(totalLines)} lines over ${String(current.options.durationMs)}ms`,
      runId: current.runId,
    });

    hooks.pre(current.options.info, current.runId);
    // A pre hook may have superseded or cancelled this run.
    if (state !== current || current.finalized) return;
    running = true;
    runStep(current.runId);
  }

  return Object.freeze({
    startScroll,
    interrupt,
    isRunning: () => running,
    snapshot: (): AnimationSnapshot | null => {
      const current = state;
      if (current === null) return null;
      return Object.freeze({
        runId: current.runId,
        totalLines: current.totalLines,
        relativePosition: current.relativePosition,
      });
    },
    dispose: () => {
      disposed = true;
      interrupt();
    },
    config,
  });
}
