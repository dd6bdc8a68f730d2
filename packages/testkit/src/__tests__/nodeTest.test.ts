import { AssertionError } from "node:assert";
import { assert, assertClose, test } from "../nodeTest.js";

test("assertClose accepts values inside the epsilon", () => {
  assertClose(0.1 + 0.2, 0.3);
  assertClose(10, 10.4, 0.5);
});

test("assertClose rejects values outside the epsilon", () => {
  assert.throws(() => assertClose(1, 1.5, 0.1), AssertionError);
});

test("assertClose reports the custom message", () => {
  assert.throws(
    () => assertClose(2, 3, 0.1, "delay drifted"),
    (err: unknown) => err instanceof AssertionError && err.message === "delay drifted",
  );
});
