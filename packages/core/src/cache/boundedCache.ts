/**
 * packages/core/src/cache/boundedCache.ts: Cost-bounded LRU cache keyed by CacheKey.
 *
 * Backed by lru-cache with a size budget. Cost is either one per entry
 * (geometry) or a function of the value (bitmap bytes). Lookups never hold a
 * renderer lock beyond the call, so renderers sharing a cache do not contend.
 */

import { LRUCache } from "lru-cache";
import { invalidProps } from "../errors.js";
import { type Logger, getLogger } from "../logger.js";
import { type CacheKey, cacheKeyId } from "./cacheKey.js";
import type { MemoryPressureSource } from "./memoryPressure.js";

/**
 * "default": evict least-recently-used entries only as far as needed.
 * `{ ratio }`: when an insert would overflow, evict down to `ratio * maxCost`
 * so a burst of inserts does not evict on every call.
 */
export type CacheCompaction = "default" | Readonly<{ ratio: number }>;

export type CacheCost<V> = "count" | ((value: V) => number);

export type BoundedCacheOptions<V> = Readonly<{
  /** Used in log records. */
  name: string;
  maxCost: number;
  cost: CacheCost<V>;
  compaction?: CacheCompaction;
  /** Drop every entry when `memoryPressure` signals. Default false. */
  clearOnWarning?: boolean;
  memoryPressure?: MemoryPressureSource;
  logger?: Logger;
}>;

export interface BoundedCache<V> {
  readonly name: string;
  readonly maxCost: number;
  /** Number of entries. */
  readonly size: number;
  /** Aggregate cost of all entries. */
  readonly totalCost: number;
  /** Lookup that refreshes recency. */
  get(key: CacheKey): V | undefined;
  /** Lookup that leaves recency untouched. */
  peek(key: CacheKey): V | undefined;
  set(key: CacheKey, value: V): void;
  clear(): void;
  /** Stop listening for memory pressure. */
  dispose(): void;
}

function validateOptions<V>(opts: BoundedCacheOptions<V>): number | null {
  if (!Number.isSafeInteger(opts.maxCost) || opts.maxCost <= 0) {
    invalidProps(`${opts.name}: maxCost must be a positive integer, got ${String(opts.maxCost)}`);
  }
  const compaction = opts.compaction ?? "default";
  if (compaction === "default") return null;
  const ratio = compaction.ratio;
  if (!Number.isFinite(ratio) || ratio <= 0 || ratio > 1) {
    invalidProps(`${opts.name}: compaction ratio must be in (0, 1], got ${String(ratio)}`);
  }
  return ratio;
}

class LruBoundedCache<V extends object> implements BoundedCache<V> {
  readonly name: string;
  readonly maxCost: number;
  private readonly lru: LRUCache<string, V>;
  private readonly costOf: (value: V) => number;
  private readonly compactionRatio: number | null;
  private readonly logger: Logger;
  private unsubscribe: (() => void) | null = null;

  constructor(opts: BoundedCacheOptions<V>) {
    this.compactionRatio = validateOptions(opts);
    this.name = opts.name;
    this.maxCost = opts.maxCost;
    this.logger = opts.logger ?? getLogger();
    const cost = opts.cost;
    // lru-cache requires positive integer sizes.
    this.costOf =
      cost === "count" ? () => 1 : (value: V) => Math.max(1, Math.ceil(cost(value)));
    this.lru = new LRUCache<string, V>({
      maxSize: opts.maxCost,
      sizeCalculation: (value) => this.costOf(value),
    });
    if (opts.clearOnWarning === true && opts.memoryPressure !== undefined) {
      this.unsubscribe = opts.memoryPressure.subscribe((level) => {
        const dropped = this.lru.size;
        this.lru.clear();
        this.logger.debug({ cache: this.name, level, dropped }, "cache cleared on memory pressure");
      });
    }
  }

  get size(): number {
    return this.lru.size;
  }

  get totalCost(): number {
    return this.lru.calculatedSize;
  }

  get(key: CacheKey): V | undefined {
    return this.lru.get(cacheKeyId(key));
  }

  peek(key: CacheKey): V | undefined {
    return this.lru.peek(cacheKeyId(key));
  }

  set(key: CacheKey, value: V): void {
    const id = cacheKeyId(key);
    const cost = this.costOf(value);
    if (cost > this.maxCost) {
      this.logger.debug(
        { cache: this.name, key: id, cost, maxCost: this.maxCost },
        "entry exceeds cache capacity; not stored",
      );
      return;
    }
    const ratio = this.compactionRatio;
    if (ratio !== null) {
      this.lru.delete(id);
      if (this.lru.calculatedSize + cost > this.maxCost) {
        const target = ratio * this.maxCost;
        while (this.lru.size > 0 && this.lru.calculatedSize + cost > target) {
          this.lru.pop();
        }
      }
    }
    this.lru.set(id, value);
  }

  clear(): void {
    this.lru.clear();
  }

  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}

export function createBoundedCache<V extends object>(opts: BoundedCacheOptions<V>): BoundedCache<V> {
  return new LruBoundedCache(opts);
}
