import assert from "node:assert/strict";
import test from "node:test";
import { StyledTextError } from "@styledtext/core";
import {
  DEFAULT_HEAP_POLL_MS,
  DEFAULT_HEAP_PRESSURE_RATIO,
  resolveNodeRenderConfig,
} from "../config.js";

test("config: empty environment resolves to defaults", () => {
  assert.deepEqual(resolveNodeRenderConfig({}), {
    logLevel: "silent",
    sizeCacheMaxItems: 1000,
    bitmapCacheMaxBytes: 20 * 1024 * 1024,
    clearOnMemoryPressure: true,
    heapPressureRatio: DEFAULT_HEAP_PRESSURE_RATIO,
    heapPollIntervalMs: DEFAULT_HEAP_POLL_MS,
  });
});

test("config: reads every variable", () => {
  const config = resolveNodeRenderConfig({
    STYLEDTEXT_LOG_LEVEL: " DEBUG ",
    STYLEDTEXT_SIZE_CACHE_ITEMS: "50",
    STYLEDTEXT_BITMAP_CACHE_BYTES: "4096",
    STYLEDTEXT_CLEAR_ON_PRESSURE: "off",
    STYLEDTEXT_HEAP_PRESSURE_RATIO: "0.5",
    STYLEDTEXT_HEAP_POLL_MS: "250",
  });
  assert.equal(config.logLevel, "debug");
  assert.equal(config.sizeCacheMaxItems, 50);
  assert.equal(config.bitmapCacheMaxBytes, 4096);
  assert.equal(config.clearOnMemoryPressure, false);
  assert.equal(config.heapPressureRatio, 0.5);
  assert.equal(config.heapPollIntervalMs, 250);
});

test("config: malformed numbers and flags fall back", () => {
  const config = resolveNodeRenderConfig({
    STYLEDTEXT_SIZE_CACHE_ITEMS: "-3",
    STYLEDTEXT_BITMAP_CACHE_BYTES: "1.5",
    STYLEDTEXT_CLEAR_ON_PRESSURE: "maybe",
    STYLEDTEXT_HEAP_PRESSURE_RATIO: "1.5",
    STYLEDTEXT_HEAP_POLL_MS: "soon",
  });
  assert.equal(config.sizeCacheMaxItems, 1000);
  assert.equal(config.bitmapCacheMaxBytes, 20 * 1024 * 1024);
  assert.equal(config.clearOnMemoryPressure, true);
  assert.equal(config.heapPressureRatio, 0.85);
  assert.equal(config.heapPollIntervalMs, 1000);
});

test("config: blank values count as unset", () => {
  assert.equal(resolveNodeRenderConfig({ STYLEDTEXT_LOG_LEVEL: "  " }).logLevel, "silent");
});

test("config: unknown log level throws", () => {
  assert.throws(
    () => resolveNodeRenderConfig({ STYLEDTEXT_LOG_LEVEL: "loud" }),
    (err: unknown) =>
      err instanceof StyledTextError &&
      err.code === "STX_INVALID_PROPS" &&
      err.message ===
        'STYLEDTEXT_LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent; got "loud"',
  );
});
