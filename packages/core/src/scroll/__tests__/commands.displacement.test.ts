import { assert, describe, test } from "@stepscroll/testkit";
import { computeTimeStep } from "../../animation/easing.js";
import { createManualTimer } from "../../testing/manualTimer.js";
import { createRecordingDriver } from "../../testing/recordingDriver.js";
import { createScrollCommands, halfPageLines, pageLines } from "../commands.js";
import { createScrollScheduler } from "../scheduler.js";

function setup(windowHeight: number) {
  const timer = createManualTimer();
  const driver = createRecordingDriver({ windowHeight });
  const infos: Array<string | undefined> = [];
  const scheduler = createScrollScheduler<string>({
    driver,
    timer,
    hooks: { pre: (info) => infos.push(info) },
  });
  const commands = createScrollCommands(scheduler, driver);
  return { timer, driver, scheduler, commands, infos };
}

describe("scroll/commands displacement", () => {
  test("pageLines keeps the context overlap and moves at least one line", () => {
    assert.equal(pageLines(20, 2), 18);
    assert.equal(pageLines(2, 2), 1);
    assert.equal(pageLines(0, 2), 1);
  });

  test("halfPageLines rounds down and moves at least one line", () => {
    assert.equal(halfPageLines(21), 10);
    assert.equal(halfPageLines(1), 1);
  });

  test("pageDown scrolls a window minus context over the page duration", () => {
    const s = setup(20);
    s.commands.pageDown("pg");
    assert.equal(s.scheduler.snapshot()?.totalLines, 18);
    assert.deepEqual(s.infos, ["pg"]);
    assert.equal(s.timer.scheduledDelays()[0], computeTimeStep(17, 18, 250, "quadratic"));
  });

  test("pageUp scrolls backward", () => {
    const s = setup(20);
    s.commands.pageUp();
    assert.equal(s.scheduler.snapshot()?.totalLines, -18);
  });

  test("half pages use half the window height and their own duration", () => {
    const s = setup(21);
    s.commands.halfPageDown();
    assert.equal(s.scheduler.snapshot()?.totalLines, 10);
    assert.equal(s.timer.scheduledDelays()[0], computeTimeStep(9, 10, 150, "quadratic"));
    s.commands.halfPageUp();
    assert.equal(s.scheduler.snapshot()?.totalLines, -10);
  });

  test("window height is read at command time", () => {
    const s = setup(20);
    s.driver.setWindowHeight(12);
    s.commands.pageDown();
    assert.equal(s.scheduler.snapshot()?.totalLines, 10);
  });

  test("line commands move the cursor along", () => {
    const s = setup(20);
    s.commands.linesDown(3);
    s.timer.runAll();
    assert.equal(s.driver.offset(), 3);
    assert.equal(s.driver.calls().filter((call) => call.kind === "moveCursorLine").length, 3);

    s.commands.linesUp(2);
    s.timer.runAll();
    assert.equal(s.driver.offset(), 1);
  });

  test("viewport commands leave the cursor in place", () => {
    const s = setup(20);
    s.commands.viewportDown(2);
    s.commands.viewportUp(1);
    s.timer.runAll();
    assert.equal(
      s.driver.calls().some((call) => call.kind === "moveCursorLine"),
      false,
    );
    assert.equal(s.driver.offset(), 0);
  });

  test("a one-line window still pages by one line", () => {
    const s = setup(1);
    s.commands.pageDown();
    assert.equal(s.driver.scrollCount(), 1);
    assert.equal(s.scheduler.isRunning(), false);
  });
});
