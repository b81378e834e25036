export { assert, describe, test } from "./nodeTest.js";
