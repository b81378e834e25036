/**
 * packages/node/src/heapPressure.ts: V8 heap usage as a memory-pressure signal.
 *
 * Polls heap statistics on an unref'd timer. Emits "warning" once when usage
 * crosses the ratio and re-arms only after usage drops back below it, so a
 * process sitting above the threshold does not clear caches on every poll.
 */

import type { Logger, MemoryPressureEmitter } from "@styledtext/core";
import { getHeapStatistics } from "node:v8";

export type HeapReading = Readonly<{ used: number; limit: number }>;

export type HeapPressureMonitorOptions = Readonly<{
  target: MemoryPressureEmitter;
  /** Fraction of the heap limit that counts as pressure, in (0, 1). */
  ratio: number;
  intervalMs: number;
  readHeap?: () => HeapReading;
  logger?: Logger;
}>;

export type HeapPressureMonitor = Readonly<{
  /** Take one reading now; returns true when it emitted a warning. */
  poll(): boolean;
  stop(): void;
}>;

export function readV8Heap(): HeapReading {
  const stats = getHeapStatistics();
  return { used: stats.used_heap_size, limit: stats.heap_size_limit };
}

export function startHeapPressureMonitor(opts: HeapPressureMonitorOptions): HeapPressureMonitor {
  const readHeap = opts.readHeap ?? readV8Heap;
  let armed = true;
  let timer: NodeJS.Timeout | null = null;

  const poll = (): boolean => {
    const { used, limit } = readHeap();
    if (limit <= 0) return false;
    const usage = used / limit;
    if (usage < opts.ratio) {
      armed = true;
      return false;
    }
    if (!armed) return false;
    armed = false;
    opts.logger?.info({ used, limit, ratio: opts.ratio }, "heap pressure; clearing render caches");
    opts.target.emit("warning");
    return true;
  };

  timer = setInterval(poll, opts.intervalMs);
  timer.unref();

  return Object.freeze({
    poll,
    stop() {
      if (timer !== null) clearInterval(timer);
      timer = null;
    },
  });
}
