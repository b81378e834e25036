/**
 * packages/core/src/cache/cacheKey.ts: Render cache keys.
 *
 * Every parameter that changes the measured geometry or the rasterized pixels
 * must be part of the key. Equal keys are always safe to serve from the same
 * cached size or bitmap.
 */

import type { Rgb24 } from "../style.js";

export type CacheKey = Readonly<{
  /** Requested width before insets; `Infinity` means fit to content. */
  width: number;
  /** Structural fingerprint of the scale-resolved storage. */
  fingerprint: string;
  backgroundColor: Rgb24 | null;
  /** Line limit of the layout container, 0 = unlimited. */
  maxLines: number;
}>;

export function createCacheKey(
  width: number,
  fingerprint: string,
  backgroundColor: Rgb24 | null,
  maxLines: number,
): CacheKey {
  return Object.freeze({ width, fingerprint, backgroundColor, maxLines });
}

export function cacheKeyEquals(a: CacheKey, b: CacheKey): boolean {
  return (
    a.width === b.width &&
    a.fingerprint === b.fingerprint &&
    a.backgroundColor === b.backgroundColor &&
    a.maxLines === b.maxLines
  );
}

/** Hashable identity of a key; equal keys have equal ids. */
export function cacheKeyId(key: CacheKey): string {
  const bg = key.backgroundColor === null ? "-" : key.backgroundColor.toString(16).padStart(6, "0");
  return `${String(key.width)}|${key.fingerprint}|${bg}|${String(key.maxLines)}`;
}
