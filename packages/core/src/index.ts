/**
 * @stepscroll/core
 *
 * Runtime-agnostic core for eased, cancellable line-by-line scrolling.
 * This package MUST NOT use Node-specific APIs (Buffer, timers, node:* imports);
 * hosts inject timers and movement through the interfaces in scroll/types.ts.
 */

// =============================================================================
// Errors and logging
// =============================================================================

export { ScrollError, type ScrollErrorCode } from "./errors.js";
export {
  type ScrollLogEvent,
  type ScrollLogFn,
  type ScrollLogLevel,
  resolveLog,
} from "./log.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_SCROLL_CONFIG,
  type ScrollConfig,
  type ScrollConfigInput,
  normalizeScrollConfig,
} from "./config.js";

// =============================================================================
// Easing
// =============================================================================

export {
  EASING_NAMES,
  IDLE_STEP_DELAY_MS,
  MIN_STEP_DELAY_MS,
  computeTimeStep,
  isEasingName,
  planStepDelays,
  resolveEasing,
  resolveInverseEasing,
} from "./animation/easing.js";
export { clamp01, secondsToDurationMs } from "./animation/interpolate.js";
export type { EasingFunction, EasingName } from "./animation/types.js";

// =============================================================================
// Scheduler and collaborators
// =============================================================================

export type {
  AnimationSnapshot,
  HighlightRefresher,
  ResolvedScrollOptions,
  ScrollDriver,
  ScrollHooks,
  ScrollOptions,
  TimerHandle,
  TimerHost,
} from "./scroll/types.js";
export {
  type ScrollScheduler,
  type ScrollSchedulerDeps,
  createScrollScheduler,
} from "./scroll/scheduler.js";
export {
  type InterruptMonitor,
  type InterruptMonitorDeps,
  createInterruptMonitor,
} from "./scroll/interruptMonitor.js";
export { type HookDispatcher, createHookDispatcher } from "./scroll/hooks.js";
export {
  type InterruptTarget,
  type InterruptTriggerRegistry,
  type InterruptTriggerSource,
  createInterruptTriggerRegistry,
} from "./scroll/interruptTriggers.js";
export {
  type ScrollCommands,
  createScrollCommands,
  halfPageLines,
  pageLines,
} from "./scroll/commands.js";
