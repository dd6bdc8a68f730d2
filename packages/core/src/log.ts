/**
 * packages/core/src/log.ts — Log event sink shared by the scheduler and config.
 */

export type ScrollLogLevel = "trace" | "info" | "warn" | "error";

export type ScrollLogEvent = Readonly<{
  level: ScrollLogLevel;
  message: string;
  /** Stable identifier for filtering, e.g. "SCROLL_HOOK_THROW". */
  code?: string;
  /** Run the event belongs to, when emitted during an animation. */
  runId?: number;
}>;

export type ScrollLogFn = (event: ScrollLogEvent) => void;

export function resolveLog(log: ScrollLogFn | undefined): ScrollLogFn {
  if (typeof log === "function") return log;
  return () => {};
}

export function describeThrown(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  return String(value);
}
