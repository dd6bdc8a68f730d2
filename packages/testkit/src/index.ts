export { assert, assertClose, describe, test } from "./nodeTest.js";
