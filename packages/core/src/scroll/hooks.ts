/**
 * packages/core/src/scroll/hooks.ts — Pre/post run hook dispatch.
 *
 * A throwing hook is reported through the log sink and never aborts a run.
 */

import { type ScrollLogFn, describeThrown } from "../log.js";
import type { ScrollHooks } from "./types.js";

export type HookDispatcher<I> = Readonly<{
  pre: (info: I | undefined, runId: number) => void;
  post: (info: I | undefined, runId: number) => void;
}>;

export function createHookDispatcher<I>(
  hooks: ScrollHooks<I> | undefined,
  log: ScrollLogFn,
): HookDispatcher<I> {
  const invoke = (
    phase: "pre" | "post",
    hook: ((info: I | undefined) => void) | undefined,
    info: I | undefined,
    runId: number,
  ): void => {
    if (hook === undefined) return;
    try {
      hook(info);
    } catch (err) {
      log({
        level: "error",
        code: "SCROLL_HOOK_THROW",
        message: `${phase} hook threw: ${describeThrown(err)}`,
        runId,
      });
    }
  };

  return Object.freeze({
    pre: (info: I | undefined, runId: number) => invoke("pre", hooks?.pre, info, runId),
    post: (info: I | undefined, runId: number) => invoke("post", hooks?.post, info, runId),
  });
}
