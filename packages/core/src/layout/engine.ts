/**
 * packages/core/src/layout/engine.ts: Text layout engine contract.
 *
 * The renderer treats the engine as an opaque collaborator. Engines hold
 * mutable layout state and are not safe to drive from two call stacks at
 * once; the renderer serializes access through its RenderLock.
 */

import type { Rgb24 } from "../style.js";
import type { RenderedStorage } from "../text/storage.js";
import type { Bitmap } from "./bitmap.js";
import type { LayoutContainer } from "./container.js";
import type { Point, Size } from "./types.js";

export type CharacterHit = Readonly<{
  /** UTF-16 index of the character under the point. */
  index: number;
  /** Fraction of the distance through the glyph, 1.0 past the end of a line. */
  fraction: number;
}>;

export interface TextLayoutEngine {
  /** Make `storage` the active text. Binds the storage on first use. */
  use(storage: RenderedStorage): void;
  /** Measure the active text at a wrap width; updates `container.size`. */
  measure(container: LayoutContainer, width: number, scale: number): Size;
  /** Rasterize the active text at an already measured size. */
  rasterize(
    container: LayoutContainer,
    size: Size,
    scale: number,
    backgroundColor: Rgb24 | null,
  ): Bitmap;
  characterIndexAt(container: LayoutContainer, point: Point): CharacterHit | null;
}
