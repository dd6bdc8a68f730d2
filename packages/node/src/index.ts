import {
  type HighlightRefresher,
  type InterruptTriggerRegistry,
  type ScrollCommands,
  type ScrollConfigInput,
  type ScrollDriver,
  type ScrollHooks,
  type ScrollLogFn,
  type ScrollScheduler,
  createInterruptTriggerRegistry,
  createScrollCommands,
  createScrollScheduler,
} from "@stepscroll/core";
import { type BufferedInput, createStreamInputProbe } from "./host/inputProbe.js";
import { type NodeTimerHost, createNodeTimerHost } from "./host/nodeTimerHost.js";

export {
  type ConsoleLike,
  type ConsoleScrollLogOptions,
  createConsoleScrollLog,
  formatScrollLogEvent,
} from "./host/consoleLog.js";
export {
  type BufferedInput,
  createEmitterTrigger,
  createStreamInputProbe,
} from "./host/inputProbe.js";
export {
  type NodeTimerHost,
  type NodeTimerHostOptions,
  createNodeTimerHost,
  sanitizeDelayMs,
} from "./host/nodeTimerHost.js";

export type CreateNodeScrollerOptions<I = unknown> = Readonly<{
  driver: ScrollDriver;
  /** Paused input stream whose buffered bytes count as pending input. */
  input?: BufferedInput;
  highlight?: HighlightRefresher;
  hooks?: ScrollHooks<I>;
  config?: ScrollConfigInput;
  log?: ScrollLogFn;
  /** Do not keep the process alive for pending scroll steps. */
  unref?: boolean;
}>;

export type NodeScroller<I = unknown> = Readonly<{
  scheduler: ScrollScheduler<I>;
  commands: ScrollCommands<I>;
  /** Trigger registry already attached to `scheduler`. */
  triggers: InterruptTriggerRegistry;
  timer: NodeTimerHost;
  /** Detach triggers, stop the running animation and refuse further runs. */
  dispose: () => void;
}>;

function withInputProbe(driver: ScrollDriver, probe: () => boolean): ScrollDriver {
  return {
    scrollForward: (units) => driver.scrollForward(units),
    scrollBackward: (units) => driver.scrollBackward(units),
    moveCursorLine: (delta) => driver.moveCursorLine?.(delta),
    setCursorVisible: (visible) => driver.setCursorVisible?.(visible),
    queryPendingInput: () => driver.queryPendingInput() || probe(),
    queryWindowHeight: () => driver.queryWindowHeight(),
  };
}

/** Wire a scheduler, its commands and a trigger registry onto Node timers. */
export function createNodeScroller<I = unknown>(
  opts: CreateNodeScrollerOptions<I>,
): NodeScroller<I> {
  const timer = createNodeTimerHost({ unref: opts.unref });
  const driver =
    opts.input === undefined
      ? opts.driver
      : withInputProbe(opts.driver, createStreamInputProbe(opts.input));

  const scheduler = createScrollScheduler<I>({
    driver,
    timer,
    highlight: opts.highlight,
    hooks: opts.hooks,
    config: opts.config,
    log: opts.log,
  });
  const triggers = createInterruptTriggerRegistry();
  triggers.attach(scheduler);

  return Object.freeze({
    scheduler,
    commands: createScrollCommands(scheduler, driver),
    triggers,
    timer,
    dispose: () => {
      triggers.detach();
      scheduler.dispose();
      timer.clear();
    },
  });
}
