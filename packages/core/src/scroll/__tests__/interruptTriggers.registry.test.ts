import { assert, describe, test } from "@stepscroll/testkit";
import { ScrollError } from "../../errors.js";
import { createInterruptTriggerRegistry } from "../interruptTriggers.js";

type ManualSource = {
  fire: () => void;
  subscribers: () => number;
  source: (fire: () => void) => () => void;
};

function createManualSource(): ManualSource {
  const listeners = new Set<() => void>();
  return {
    fire: () => {
      for (const listener of listeners) listener();
    },
    subscribers: () => listeners.size,
    source: (fire) => {
      listeners.add(fire);
      return () => {
        listeners.delete(fire);
      };
    },
  };
}

function createTarget() {
  let count = 0;
  return {
    interrupt: () => {
      count++;
    },
    count: () => count,
  };
}

describe("scroll/interruptTriggers", () => {
  test("attached sources interrupt the target", () => {
    const registry = createInterruptTriggerRegistry();
    const motion = createManualSource();
    const target = createTarget();

    registry.register("cursor-motion", motion.source);
    motion.fire();
    assert.equal(target.count(), 0);

    registry.attach(target);
    motion.fire();
    motion.fire();
    assert.equal(target.count(), 2);
  });

  test("sources registered after attach are wired immediately", () => {
    const registry = createInterruptTriggerRegistry();
    const target = createTarget();
    registry.attach(target);

    const click = createManualSource();
    registry.register("mouse-click", click.source);
    click.fire();
    assert.equal(target.count(), 1);
  });

  test("detach unsubscribes every source", () => {
    const registry = createInterruptTriggerRegistry();
    const a = createManualSource();
    const b = createManualSource();
    registry.register("a", a.source);
    registry.register("b", b.source);
    registry.attach(createTarget());
    assert.equal(a.subscribers() + b.subscribers(), 2);

    registry.detach();
    assert.equal(a.subscribers() + b.subscribers(), 0);
  });

  test("re-attaching moves sources to the new target", () => {
    const registry = createInterruptTriggerRegistry();
    const source = createManualSource();
    const first = createTarget();
    const second = createTarget();
    registry.register("buffer-switch", source.source);
    registry.attach(first);
    registry.attach(second);
    source.fire();
    assert.equal(first.count(), 0);
    assert.equal(second.count(), 1);
    assert.equal(source.subscribers(), 1);
  });

  test("unregister removes one source", () => {
    const registry = createInterruptTriggerRegistry();
    const source = createManualSource();
    registry.register("a", source.source);
    registry.attach(createTarget());
    assert.equal(registry.unregister("a"), true);
    assert.equal(registry.unregister("a"), false);
    assert.equal(source.subscribers(), 0);
    assert.deepEqual(registry.names(), []);
  });

  test("duplicate names are rejected", () => {
    const registry = createInterruptTriggerRegistry();
    registry.register("a", createManualSource().source);
    assert.throws(
      () => registry.register("a", createManualSource().source),
      (err: unknown) => err instanceof ScrollError && err.code === "SCROLL_DUPLICATE_TRIGGER",
    );
  });
});
