/**
 * packages/core/src/renderer/styledTextRenderer.ts: Cached measurement and rasterization.
 *
 * A renderer owns one layout container, one layout engine binding and a map
 * of scale-resolved storages (one per text-scale category, built on first
 * use). It shares its size and bitmap caches, by default the global ones,
 * with any number of other renderers.
 *
 * Keys combine the requested width, the storage fingerprint (extended with
 * the pixel scale and the horizontal insets), the background color and the
 * container's live line limit. Sizes are cached under the
 * width the caller asked for, before insets are subtracted.
 *
 * Every entry point that touches engine state runs under the renderer's own
 * lock; caches are consulted without any shared lock.
 */

import type { BoundedCache } from "../cache/boundedCache.js";
import { type CacheKey, cacheKeyId, createCacheKey } from "../cache/cacheKey.js";
import { getGlobalBitmapCache, getGlobalSizeCache } from "../cache/globalCaches.js";
import type { Bitmap } from "../layout/bitmap.js";
import { createCellLayoutEngine } from "../layout/cellLayoutEngine.js";
import { type LayoutContainer, createLayoutContainer } from "../layout/container.js";
import type { TextLayoutEngine } from "../layout/engine.js";
import { type EdgeInsets, type Point, type Size, expandByInset } from "../layout/types.js";
import { type Logger, getLogger } from "../logger.js";
import type { Rgb24, TextAttributes } from "../style.js";
import { RenderedStorage } from "../text/storage.js";
import type { StyledTextSource } from "../text/styledText.js";
import { type TextScaleCategory, assertTextScaleCategory } from "../text/textScale.js";
import {
  type StyledTextRendererOptions,
  assertMaximumNumberOfLines,
  assertWidth,
  resolveRendererOptions,
} from "./options.js";
import { RenderLock } from "./renderLock.js";

export type WarmOption = "size" | "bitmap";

export type RenderResult = Readonly<{ bitmap: Bitmap; size: Size }>;

export type CachedRenderResult = Readonly<{ bitmap: Bitmap | null; size: Size | null }>;

export type AttributesHit = Readonly<{ attributes: TextAttributes; index: number }>;

export class StyledTextRenderer {
  readonly string: StyledTextSource;
  readonly inset: EdgeInsets;
  readonly backgroundColor: Rgb24 | null;
  readonly scale: number;
  readonly sizeCache: BoundedCache<Size>;
  readonly bitmapCache: BoundedCache<Bitmap>;

  private readonly engine: TextLayoutEngine;
  private readonly container: LayoutContainer;
  private readonly storages = new Map<TextScaleCategory, RenderedStorage>();
  private readonly lock = new RenderLock();
  private readonly logger: Logger;
  private category: TextScaleCategory;

  constructor(opts: StyledTextRendererOptions) {
    const resolved = resolveRendererOptions(opts);
    this.string = resolved.string;
    this.category = resolved.textScaleCategory;
    this.inset = resolved.inset;
    this.backgroundColor = resolved.backgroundColor;
    this.scale = resolved.scale;
    this.sizeCache = opts.sizeCache ?? getGlobalSizeCache();
    this.bitmapCache = opts.bitmapCache ?? getGlobalBitmapCache();
    this.engine = opts.layoutEngine ?? createCellLayoutEngine();
    this.container = createLayoutContainer(resolved.maximumNumberOfLines);
    this.logger = opts.logger ?? getLogger();
  }

  get textScaleCategory(): TextScaleCategory {
    return this.category;
  }

  get maximumNumberOfLines(): number {
    return this.container.maximumNumberOfLines;
  }

  /** Measured size of the text within `width`, excluding insets. */
  size(width: number = Number.POSITIVE_INFINITY): Size {
    assertWidth(width, "size");
    return this.lock.run("size", () => this.sizeForKey(this.keyFor(width)));
  }

  /** Measured size grown by the insets on every edge. */
  viewSize(width: number = Number.POSITIVE_INFINITY): Size {
    return expandByInset(this.size(width), this.inset);
  }

  render(width: number): RenderResult {
    assertWidth(width, "render");
    return this.lock.run("render", () => {
      const key = this.keyFor(width);
      const size = this.sizeForKey(key);
      const cached = this.bitmapCache.get(key);
      if (cached !== undefined) {
        this.logger.trace({ key: cacheKeyId(key) }, "bitmap cache hit");
        return { bitmap: cached, size };
      }
      this.logger.trace({ key: cacheKeyId(key) }, "bitmap cache miss");
      const bitmap = this.engine.rasterize(this.container, size, this.scale, this.backgroundColor);
      this.bitmapCache.set(key, bitmap);
      return { bitmap, size };
    });
  }

  /** Whatever is already cached for `width`; never measures or rasterizes. */
  cachedRender(width: number): CachedRenderResult {
    assertWidth(width, "cachedRender");
    return this.lock.run("cachedRender", () => {
      const key = this.keyFor(width);
      return {
        bitmap: this.bitmapCache.peek(key) ?? null,
        size: this.sizeCache.peek(key) ?? null,
      };
    });
  }

  /**
   * Attributes and character index under `point`, or null when the point is
   * not within a glyph (past the end of a line, or outside any text).
   */
  attributesAt(point: Point): AttributesHit | null {
    return this.lock.run("attributesAt", () => {
      const storage = this.resolveStorage();
      const hit = this.engine.characterIndexAt(this.container, point);
      if (hit === null || hit.fraction >= 1) return null;
      const attributes = storage.attributesAt(hit.index);
      if (attributes === null) return null;
      return { attributes, index: hit.index };
    });
  }

  warm(option: WarmOption, width: number): this {
    if (option === "size") this.size(width);
    else this.render(width);
    return this;
  }

  /**
   * Empty both caches this renderer uses. With the global caches this drops
   * entries of every renderer sharing them.
   */
  clearCaches(): this {
    this.sizeCache.clear();
    this.bitmapCache.clear();
    return this;
  }

  setTextScaleCategory(category: TextScaleCategory): this {
    const next = assertTextScaleCategory(category, "setTextScaleCategory");
    this.lock.run("setTextScaleCategory", () => {
      this.category = next;
    });
    return this;
  }

  setMaximumNumberOfLines(maximumNumberOfLines: number): this {
    const next = assertMaximumNumberOfLines(maximumNumberOfLines, "setMaximumNumberOfLines");
    this.lock.run("setMaximumNumberOfLines", () => {
      this.container.maximumNumberOfLines = next;
    });
    return this;
  }

  // Callers hold the lock.
  private resolveStorage(): RenderedStorage {
    let storage = this.storages.get(this.category);
    if (storage === undefined) {
      storage = new RenderedStorage(this.string.render(this.category), this.category);
      this.storages.set(this.category, storage);
    }
    this.engine.use(storage);
    return storage;
  }

  // Callers hold the lock.
  private keyFor(width: number): CacheKey {
    const storage = this.resolveStorage();
    return createCacheKey(
      width,
      this.renderFingerprint(storage),
      this.backgroundColor,
      this.container.maximumNumberOfLines,
    );
  }

  // Sizes live under the requested width, so the pixel scale and the
  // horizontal insets that turn it into a wrap width ride in the fingerprint.
  private renderFingerprint(storage: RenderedStorage): string {
    const { left, right } = this.inset;
    return `${storage.fingerprint}@${String(this.scale)}:${String(left)}:${String(right)}`;
  }

  // Callers hold the lock.
  private sizeForKey(key: CacheKey): Size {
    const cached = this.sizeCache.get(key);
    if (cached !== undefined) {
      // Rasterization and hit-testing read the container's size.
      this.container.size = cached;
      this.logger.trace({ key: cacheKeyId(key) }, "size cache hit");
      return cached;
    }
    this.logger.trace({ key: cacheKeyId(key) }, "size cache miss");
    const insetWidth = Math.max(key.width - this.inset.left - this.inset.right, 0);
    const size = this.engine.measure(this.container, insetWidth, this.scale);
    this.sizeCache.set(key, size);
    return size;
  }
}

export function createStyledTextRenderer(opts: StyledTextRendererOptions): StyledTextRenderer {
  return new StyledTextRenderer(opts);
}
