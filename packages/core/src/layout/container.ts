/**
 * packages/core/src/layout/container.ts: The mutable region text is laid out in.
 *
 * A container belongs to exactly one renderer. Its size always reflects the
 * last measurement requested through that renderer, including cache hits,
 * because rasterization and hit-testing lay out against it.
 */

import type { Size } from "./types.js";

export type LayoutContainer = {
  size: Size;
  /** 0 means unlimited. */
  maximumNumberOfLines: number;
};

export function createLayoutContainer(maximumNumberOfLines: number): LayoutContainer {
  return {
    size: { w: Number.POSITIVE_INFINITY, h: Number.POSITIVE_INFINITY },
    maximumNumberOfLines,
  };
}
