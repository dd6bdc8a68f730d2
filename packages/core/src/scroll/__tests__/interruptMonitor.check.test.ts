import { assert, describe, test } from "@stepscroll/testkit";
import { createInterruptMonitor } from "../interruptMonitor.js";

function setup(active: boolean, pending: boolean) {
  let interrupts = 0;
  let queries = 0;
  const monitor = createInterruptMonitor({
    isActive: () => active,
    queryPendingInput: () => {
      queries++;
      return pending;
    },
    interrupt: () => {
      interrupts++;
    },
  });
  return { monitor, interrupts: () => interrupts, queries: () => queries };
}

describe("scroll/interruptMonitor", () => {
  test("fires when active and input is pending", () => {
    const s = setup(true, true);
    assert.equal(s.monitor.check(), true);
    assert.equal(s.interrupts(), 1);
  });

  test("stays quiet without pending input", () => {
    const s = setup(true, false);
    assert.equal(s.monitor.check(), false);
    assert.equal(s.interrupts(), 0);
  });

  test("does not query the host while idle", () => {
    const s = setup(false, true);
    assert.equal(s.monitor.check(), false);
    assert.equal(s.queries(), 0);
    assert.equal(s.interrupts(), 0);
  });
});
