/**
 * @styledtext/core
 *
 * Runtime-agnostic core: styled text, render cache keys, bounded caches and
 * the cached StyledTextRenderer.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors and logging
// =============================================================================

export { StyledTextError, type StyledTextErrorCode } from "./errors.js";
export { getLogger, setLogger, type Logger } from "./logger.js";

// =============================================================================
// Styled text
// =============================================================================

export {
  rgb,
  rgbR,
  rgbG,
  rgbB,
  isRgb24,
  DEFAULT_FG,
  DEFAULT_FONT,
  DEFAULT_FONT_SIZE,
  type Rgb24,
  type TextAlign,
  type TextAttributes,
  type TextStyle,
} from "./style.js";

export {
  DEFAULT_TEXT_SCALE_CATEGORY,
  TEXT_SCALE_CATEGORIES,
  isTextScaleCategory,
  scaledFontSize,
  textScaleMultiplier,
  type TextScaleCategory,
} from "./text/textScale.js";

export {
  StyledTextBuilder,
  StyledTextString,
  attributesEqual,
  styledText,
  type AttributeRun,
  type StyledTextPart,
  type StyledTextRun,
  type StyledTextSource,
} from "./text/styledText.js";

export { RenderedStorage, fingerprintStyledRun } from "./text/storage.js";

// =============================================================================
// Layout
// =============================================================================

export {
  ZERO_INSETS,
  ceilToScale,
  expandByInset,
  size,
  type EdgeInsets,
  type Point,
  type Size,
} from "./layout/types.js";

export { bitmapByteSize, createBitmap, pixelAt, type Bitmap } from "./layout/bitmap.js";
export { createLayoutContainer, type LayoutContainer } from "./layout/container.js";
export type { CharacterHit, TextLayoutEngine } from "./layout/engine.js";
export {
  CELL_ADVANCE_EM,
  LINE_HEIGHT_MULTIPLE,
  CellLayoutEngine,
  createCellLayoutEngine,
  layoutCells,
  type CellLayout,
  type LaidGlyph,
  type LaidLine,
} from "./layout/cellLayoutEngine.js";
export {
  clearTextMeasureCache,
  getTextMeasureCacheSize,
  measureGraphemeCells,
  measureTextCells,
  segmentGraphemes,
  type Grapheme,
} from "./layout/textMeasure.js";

// =============================================================================
// Caches
// =============================================================================

export { cacheKeyEquals, cacheKeyId, createCacheKey, type CacheKey } from "./cache/cacheKey.js";
export {
  createBoundedCache,
  type BoundedCache,
  type BoundedCacheOptions,
  type CacheCompaction,
  type CacheCost,
} from "./cache/boundedCache.js";
export {
  createMemoryPressureEmitter,
  type MemoryPressureEmitter,
  type MemoryPressureLevel,
  type MemoryPressureListener,
  type MemoryPressureSource,
} from "./cache/memoryPressure.js";
export {
  GLOBAL_BITMAP_CACHE_MAX_BYTES,
  GLOBAL_SIZE_CACHE_MAX_ITEMS,
  configureGlobalCaches,
  getGlobalBitmapCache,
  getGlobalMemoryPressure,
  getGlobalSizeCache,
  globalCachesCreated,
  type GlobalCacheConfig,
} from "./cache/globalCaches.js";

// =============================================================================
// Renderer
// =============================================================================

export {
  StyledTextRenderer,
  createStyledTextRenderer,
  type AttributesHit,
  type CachedRenderResult,
  type RenderResult,
  type WarmOption,
} from "./renderer/styledTextRenderer.js";
export { DEFAULT_PIXEL_SCALE, type StyledTextRendererOptions } from "./renderer/options.js";
export { RenderLock } from "./renderer/renderLock.js";
