/**
 * packages/core/src/cache/memoryPressure.ts: Memory-pressure notifications.
 *
 * Caches subscribe and drop everything on a warning. Hosts decide what counts
 * as pressure (see @styledtext/node for the heap monitor).
 */

import { getLogger } from "../logger.js";

export type MemoryPressureLevel = "warning" | "critical";

export type MemoryPressureListener = (level: MemoryPressureLevel) => void;

export type MemoryPressureSource = Readonly<{
  /** Returns an unsubscribe function. */
  subscribe(listener: MemoryPressureListener): () => void;
}>;

export type MemoryPressureEmitter = MemoryPressureSource &
  Readonly<{
    emit(level: MemoryPressureLevel): void;
    listenerCount(): number;
  }>;

export function createMemoryPressureEmitter(): MemoryPressureEmitter {
  const listeners = new Set<MemoryPressureListener>();

  return Object.freeze({
    subscribe(listener: MemoryPressureListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    emit(level: MemoryPressureLevel): void {
      for (const listener of [...listeners]) {
        try {
          listener(level);
        } catch (err: unknown) {
          getLogger().warn({ err, level }, "memory pressure listener threw");
        }
      }
    },
    listenerCount(): number {
      return listeners.size;
    },
  });
}
