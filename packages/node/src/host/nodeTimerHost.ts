/**
 * Node TimerHost over setTimeout/clearTimeout.
 *
 * Node timers are truly cancellable: once `cancel` returns, the callback is
 * gone from the event loop.
 */

import type { TimerHandle, TimerHost } from "@stepscroll/core";

export type NodeTimerHostOptions = Readonly<{
  /** Do not keep the process alive for pending scroll steps. */
  unref?: boolean;
}>;

export type NodeTimerHost = TimerHost &
  Readonly<{
    pendingCount: () => number;
    /** Cancel every pending callback. */
    clear: () => void;
  }>;

export function sanitizeDelayMs(delayMs: number): number {
  if (!Number.isFinite(delayMs) || delayMs <= 0) return 0;
  return Math.floor(delayMs);
}

export function createNodeTimerHost(opts: NodeTimerHostOptions = {}): NodeTimerHost {
  let nextId = 1;
  const timers = new Map<number, ReturnType<typeof setTimeout>>();

  return Object.freeze({
    scheduleOnce: (delayMs: number, callback: () => void): TimerHandle => {
      const id = nextId++;
      const timeout = setTimeout(() => {
        timers.delete(id);
        callback();
      }, sanitizeDelayMs(delayMs));
      if (opts.unref === true) timeout.unref();
      timers.set(id, timeout);
      return Object.freeze({ id });
    },
    cancel: (handle: TimerHandle): void => {
      const timeout = timers.get(handle.id);
      if (timeout === undefined) return;
      timers.delete(handle.id);
      clearTimeout(timeout);
    },
    pendingCount: () => timers.size,
    clear: () => {
      for (const timeout of timers.values()) clearTimeout(timeout);
      timers.clear();
    },
  });
}
