import assert from "node:assert/strict";
import test from "node:test";
import { createNodeLogger } from "../logger.js";

test("logger: honours the configured level", () => {
  const logger = createNodeLogger("warn");
  assert.equal(logger.level, "warn");
  assert.equal(logger.isLevelEnabled("warn"), true);
  assert.equal(logger.isLevelEnabled("info"), false);
});

test("logger: silent disables every level", () => {
  assert.equal(createNodeLogger("silent").isLevelEnabled("fatal"), false);
});
