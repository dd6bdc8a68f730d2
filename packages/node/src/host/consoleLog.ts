/**
 * Console-backed ScrollLogFn.
 */

import type { ScrollLogEvent, ScrollLogFn, ScrollLogLevel } from "@stepscroll/core";

const LEVEL_RANK: Readonly<Record<ScrollLogLevel, number>> = Object.freeze({
  trace: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export type ConsoleLike = Readonly<{
  log: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}>;

export type ConsoleScrollLogOptions = Readonly<{
  /** Lowest level written. Defaults to "warn". */
  level?: ScrollLogLevel;
  console?: ConsoleLike;
}>;

export function formatScrollLogEvent(event: ScrollLogEvent): string {
  const code = event.code !== undefined ? ` ${event.code}` : "";
  const run = event.runId !== undefined ? ` run=${String(event.runId)}` : "";
  return `[stepscroll][${event.level}]${code}${run} ${event.message}`;
}

export function createConsoleScrollLog(opts: ConsoleScrollLogOptions = {}): ScrollLogFn {
  const minRank = LEVEL_RANK[opts.level ?? "warn"];
  const sink: ConsoleLike = opts.console ?? console;
  return (event) => {
    if (LEVEL_RANK[event.level] < minRank) return;
    const line = formatScrollLogEvent(event);
    if (event.level === "error") sink.error(line);
    else if (event.level === "warn") sink.warn(line);
    else sink.log(line);
  };
}
