/**
 * packages/core/src/cache/globalCaches.ts: Process-wide default caches.
 *
 * Both caches are created lazily on first use and live until the process (or
 * worker) exits. Every renderer that does not bring its own caches shares
 * them, so clearing them is a global invalidation.
 *
 * Defaults:
 *   - size cache:   1000 entries (every size costs 1)
 *   - bitmap cache: 20 MiB of pixel data
 * Both clear themselves on the global memory-pressure source.
 *
 * configureGlobalCaches() may change these before first use only.
 */

import { StyledTextError, invalidProps } from "../errors.js";
import type { Bitmap } from "../layout/bitmap.js";
import { bitmapByteSize } from "../layout/bitmap.js";
import type { Size } from "../layout/types.js";
import type { Logger } from "../logger.js";
import { type BoundedCache, type CacheCompaction, createBoundedCache } from "./boundedCache.js";
import { type MemoryPressureEmitter, createMemoryPressureEmitter } from "./memoryPressure.js";

export const GLOBAL_SIZE_CACHE_MAX_ITEMS = 1000;
export const GLOBAL_BITMAP_CACHE_MAX_BYTES = 20 * 1024 * 1024;

export type GlobalCacheConfig = Readonly<{
  sizeCacheMaxItems?: number;
  bitmapCacheMaxBytes?: number;
  compaction?: CacheCompaction;
  clearOnWarning?: boolean;
  logger?: Logger;
}>;

let config: GlobalCacheConfig = {};
let globalSizeCache: BoundedCache<Size> | null = null;
let globalBitmapCache: BoundedCache<Bitmap> | null = null;
let globalMemoryPressure: MemoryPressureEmitter | null = null;

function positiveIntOr(value: number | undefined, fallback: number, field: string): number {
  if (value === undefined) return fallback;
  if (!Number.isSafeInteger(value) || value <= 0) {
    invalidProps(`configureGlobalCaches: ${field} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

/** Override global cache settings. Throws once either cache exists. */
export function configureGlobalCaches(next: GlobalCacheConfig): void {
  if (globalSizeCache !== null || globalBitmapCache !== null) {
    throw new StyledTextError(
      "STX_INVALID_STATE",
      "configureGlobalCaches: global caches are already in use",
    );
  }
  positiveIntOr(next.sizeCacheMaxItems, GLOBAL_SIZE_CACHE_MAX_ITEMS, "sizeCacheMaxItems");
  positiveIntOr(next.bitmapCacheMaxBytes, GLOBAL_BITMAP_CACHE_MAX_BYTES, "bitmapCacheMaxBytes");
  config = { ...next };
}

export function globalCachesCreated(): boolean {
  return globalSizeCache !== null || globalBitmapCache !== null;
}

export function getGlobalMemoryPressure(): MemoryPressureEmitter {
  if (globalMemoryPressure === null) globalMemoryPressure = createMemoryPressureEmitter();
  return globalMemoryPressure;
}

export function getGlobalSizeCache(): BoundedCache<Size> {
  if (globalSizeCache === null) {
    globalSizeCache = createBoundedCache<Size>({
      name: "global-size",
      maxCost: config.sizeCacheMaxItems ?? GLOBAL_SIZE_CACHE_MAX_ITEMS,
      cost: "count",
      compaction: config.compaction ?? "default",
      clearOnWarning: config.clearOnWarning ?? true,
      memoryPressure: getGlobalMemoryPressure(),
      ...(config.logger !== undefined ? { logger: config.logger } : {}),
    });
  }
  return globalSizeCache;
}

export function getGlobalBitmapCache(): BoundedCache<Bitmap> {
  if (globalBitmapCache === null) {
    globalBitmapCache = createBoundedCache<Bitmap>({
      name: "global-bitmap",
      maxCost: config.bitmapCacheMaxBytes ?? GLOBAL_BITMAP_CACHE_MAX_BYTES,
      cost: bitmapByteSize,
      compaction: config.compaction ?? "default",
      clearOnWarning: config.clearOnWarning ?? true,
      memoryPressure: getGlobalMemoryPressure(),
      ...(config.logger !== undefined ? { logger: config.logger } : {}),
    });
  }
  return globalBitmapCache;
}
