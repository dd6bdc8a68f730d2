/**
 * packages/core/src/scroll/commands.ts — Page, half-page and line scroll commands.
 *
 * Each command derives a displacement from the driver's window height and
 * starts a run with the matching configured duration.
 */

import type { ScrollScheduler } from "./scheduler.js";
import type { ScrollDriver } from "./types.js";

export type ScrollCommands<I = unknown> = Readonly<{
  pageDown: (info?: I) => void;
  pageUp: (info?: I) => void;
  halfPageDown: (info?: I) => void;
  halfPageUp: (info?: I) => void;
  linesDown: (count: number, info?: I) => void;
  linesUp: (count: number, info?: I) => void;
  /** Scroll the viewport without moving the cursor. */
  viewportDown: (count: number, info?: I) => void;
  viewportUp: (count: number, info?: I) => void;
}>;

function windowHeight(driver: ScrollDriver): number {
  const height = driver.queryWindowHeight();
  if (!Number.isFinite(height)) return 0;
  return Math.max(0, Math.trunc(height));
}

/** Lines a full-page scroll moves, keeping `contextLines` of overlap. */
export function pageLines(height: number, contextLines: number): number {
  return Math.max(1, height - contextLines);
}

export function halfPageLines(height: number): number {
  return Math.max(1, Math.floor(height / 2));
}

export function createScrollCommands<I = unknown>(
  scheduler: ScrollScheduler<I>,
  driver: ScrollDriver,
): ScrollCommands<I> {
  const { config } = scheduler;

  const page = (sign: 1 | -1, info: I | undefined): void => {
    const lines = pageLines(windowHeight(driver), config.nextScreenContextLines);
    scheduler.startScroll(sign * lines, { durationSeconds: config.pageDurationSeconds, info });
  };

  const halfPage = (sign: 1 | -1, info: I | undefined): void => {
    const lines = halfPageLines(windowHeight(driver));
    scheduler.startScroll(sign * lines, { durationSeconds: config.halfPageDurationSeconds, info });
  };

  const lines = (sign: 1 | -1, count: number, moveCursor: boolean, info: I | undefined): void => {
    scheduler.startScroll(sign * count, {
      durationSeconds: config.lineDurationSeconds,
      moveCursor,
      info,
    });
  };

  return Object.freeze({
    pageDown: (info?: I) => page(1, info),
    pageUp: (info?: I) => page(-1, info),
    halfPageDown: (info?: I) => halfPage(1, info),
    halfPageUp: (info?: I) => halfPage(-1, info),
    linesDown: (count: number, info?: I) => lines(1, count, config.moveCursor, info),
    linesUp: (count: number, info?: I) => lines(-1, count, config.moveCursor, info),
    viewportDown: (count: number, info?: I) => lines(1, count, false, info),
    viewportUp: (count: number, info?: I) => lines(-1, count, false, info),
  });
}
