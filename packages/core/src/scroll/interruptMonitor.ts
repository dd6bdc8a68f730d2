/**
 * packages/core/src/scroll/interruptMonitor.ts — Pending-input cancellation check.
 *
 * Runs at the top of every step, so a keypress cancels a run within one step
 * interval.
 */

export type InterruptMonitorDeps = Readonly<{
  isActive: () => boolean;
  queryPendingInput: () => boolean;
  interrupt: () => void;
}>;

export type InterruptMonitor = Readonly<{
  /** True when the run was just cancelled; `interrupt` has already run. */
  check: () => boolean;
}>;

export function createInterruptMonitor(deps: InterruptMonitorDeps): InterruptMonitor {
  return Object.freeze({
    check: (): boolean => {
      if (!deps.isActive()) return false;
      if (!deps.queryPendingInput()) return false;
      deps.interrupt();
      return true;
    },
  });
}
