/**
 * packages/core/src/scroll/interruptTriggers.ts — Named sources that cancel runs.
 *
 * Hosts register anything that should stop an animation (a cursor motion
 * command, a buffer switch, a mouse click) as a subscribe function. Attaching
 * a scheduler wires every source to its `interrupt()`.
 */

import { ScrollError } from "../errors.js";

/** Subscribe to a trigger source. Returns the matching unsubscribe function. */
export type InterruptTriggerSource = (fire: () => void) => () => void;

export type InterruptTarget = Readonly<{ interrupt: () => void }>;

export type InterruptTriggerRegistry = Readonly<{
  register: (name: string, source: InterruptTriggerSource) => void;
  /** Remove a source, unsubscribing it if attached. Returns false when unknown. */
  unregister: (name: string) => boolean;
  /** Wire every source, current and future, to `target.interrupt()`. */
  attach: (target: InterruptTarget) => void;
  detach: () => void;
  names: () => readonly string[];
}>;

export function createInterruptTriggerRegistry(): InterruptTriggerRegistry {
  const sources = new Map<string, InterruptTriggerSource>();
  const subscriptions = new Map<string, () => void>();
  let target: InterruptTarget | null = null;

  const subscribe = (name: string, source: InterruptTriggerSource, to: InterruptTarget): void => {
    subscriptions.set(name, source(() => to.interrupt()));
  };

  const unsubscribe = (name: string): void => {
    const off = subscriptions.get(name);
    if (off === undefined) return;
    subscriptions.delete(name);
    off();
  };

  const detach = (): void => {
    for (const name of [...subscriptions.keys()]) unsubscribe(name);
    target = null;
  };

  return Object.freeze({
    register: (name: string, source: InterruptTriggerSource) => {
      if (sources.has(name)) {
        throw new ScrollError(
          "SCROLL_DUPLICATE_TRIGGER",
          `Interrupt trigger "${name}" is already registered`,
        );
      }
      sources.set(name, source);
      if (target !== null) subscribe(name, source, target);
    },
    unregister: (name: string) => {
      if (!sources.delete(name)) return false;
      unsubscribe(name);
      return true;
    },
    attach: (next: InterruptTarget) => {
      detach();
      target = next;
      for (const [name, source] of sources) subscribe(name, source, next);
    },
    detach,
    names: () => Object.freeze([...sources.keys()]),
  });
}
