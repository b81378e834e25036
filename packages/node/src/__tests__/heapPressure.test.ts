import assert from "node:assert/strict";
import test from "node:test";
import { createMemoryPressureEmitter } from "@styledtext/core";
import { type HeapReading, readV8Heap, startHeapPressureMonitor } from "../heapPressure.js";

test("heap pressure: emits once per crossing and re-arms below the ratio", () => {
  const target = createMemoryPressureEmitter();
  let emitted = 0;
  target.subscribe(() => {
    emitted++;
  });
  let reading: HeapReading = { used: 50, limit: 100 };
  const monitor = startHeapPressureMonitor({
    target,
    ratio: 0.85,
    intervalMs: 60_000,
    readHeap: () => reading,
  });
  try {
    assert.equal(monitor.poll(), false);
    reading = { used: 90, limit: 100 };
    assert.equal(monitor.poll(), true);
    reading = { used: 95, limit: 100 };
    assert.equal(monitor.poll(), false);
    reading = { used: 50, limit: 100 };
    assert.equal(monitor.poll(), false);
    reading = { used: 85, limit: 100 };
    assert.equal(monitor.poll(), true);
    assert.equal(emitted, 2);
  } finally {
    monitor.stop();
  }
});

test("heap pressure: an unknown limit never emits", () => {
  const monitor = startHeapPressureMonitor({
    target: createMemoryPressureEmitter(),
    ratio: 0.5,
    intervalMs: 60_000,
    readHeap: () => ({ used: 10, limit: 0 }),
  });
  try {
    assert.equal(monitor.poll(), false);
  } finally {
    monitor.stop();
  }
});

test("heap pressure: reads V8 heap statistics", () => {
  const { used, limit } = readV8Heap();
  assert.ok(used > 0);
  assert.ok(limit >= used);
});
