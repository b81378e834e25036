import { assert, describe, test } from "@styledtext/testkit";
import { type MemoryPressureLevel, createMemoryPressureEmitter } from "../memoryPressure.js";

describe("memory pressure emitter", () => {
  test("delivers levels to subscribers until they unsubscribe", () => {
    const emitter = createMemoryPressureEmitter();
    const seen: MemoryPressureLevel[] = [];
    const unsubscribe = emitter.subscribe((level) => seen.push(level));
    emitter.emit("warning");
    emitter.emit("critical");
    unsubscribe();
    emitter.emit("warning");
    assert.deepEqual(seen, ["warning", "critical"]);
    assert.equal(emitter.listenerCount(), 0);
  });

  test("a throwing listener does not stop the others", () => {
    const emitter = createMemoryPressureEmitter();
    let delivered = 0;
    emitter.subscribe(() => {
      throw new Error("listener failure");
    });
    emitter.subscribe(() => {
      delivered++;
    });
    emitter.emit("warning");
    assert.equal(delivered, 1);
  });
});
