/**
 * Pending-input signals for terminal hosts.
 */

import type { EventEmitter } from "node:events";
import type { InterruptTriggerSource } from "@stepscroll/core";

/** The part of a Readable the probe needs. */
export type BufferedInput = Readonly<{ readableLength: number }>;

/**
 * True while `stream` holds unread bytes.
 *
 * Only meaningful for a paused stream: a flowing stream hands its bytes to
 * listeners and never reports a backlog.
 */
export function createStreamInputProbe(stream: BufferedInput): () => boolean {
  return () => stream.readableLength > 0;
}

/** Interrupt trigger that fires on every `eventName` emitted by `emitter`. */
export function createEmitterTrigger(
  emitter: EventEmitter,
  eventName: string | symbol,
): InterruptTriggerSource {
  return (fire) => {
    const listener = (): void => fire();
    emitter.on(eventName, listener);
    return () => {
      emitter.off(eventName, listener);
    };
  };
}
