/**
 * packages/core/src/renderer/options.ts: Renderer construction options and guards.
 */

import type { BoundedCache } from "../cache/boundedCache.js";
import { invalidProps } from "../errors.js";
import type { Bitmap } from "../layout/bitmap.js";
import type { TextLayoutEngine } from "../layout/engine.js";
import { type EdgeInsets, type Size, normalizeInsets } from "../layout/types.js";
import type { Logger } from "../logger.js";
import { type Rgb24, assertRgb24 } from "../style.js";
import type { StyledTextSource } from "../text/styledText.js";
import { type TextScaleCategory, assertTextScaleCategory } from "../text/textScale.js";

export const DEFAULT_PIXEL_SCALE = 1;

export type StyledTextRendererOptions = Readonly<{
  string: StyledTextSource;
  textScaleCategory: TextScaleCategory;
  inset?: Partial<EdgeInsets>;
  backgroundColor?: Rgb24 | null;
  /** Pixels per logical unit. Default 1. */
  scale?: number;
  /** 0 means unlimited. Default 0. */
  maximumNumberOfLines?: number;
  /** Defaults to a fresh cell layout engine owned by the renderer. */
  layoutEngine?: TextLayoutEngine;
  /** Defaults to the global size cache. */
  sizeCache?: BoundedCache<Size>;
  /** Defaults to the global bitmap cache. */
  bitmapCache?: BoundedCache<Bitmap>;
  logger?: Logger;
}>;

export type ResolvedRendererOptions = Readonly<{
  string: StyledTextSource;
  textScaleCategory: TextScaleCategory;
  inset: EdgeInsets;
  backgroundColor: Rgb24 | null;
  scale: number;
  maximumNumberOfLines: number;
}>;

export function assertMaximumNumberOfLines(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    invalidProps(`${where}: maximumNumberOfLines must be a non-negative integer, got ${String(value)}`);
  }
  return value;
}

export function assertWidth(width: unknown, where: string): number {
  if (typeof width !== "number" || Number.isNaN(width) || width < 0) {
    invalidProps(`${where}: width must be a non-negative number or Infinity, got ${String(width)}`);
  }
  return width;
}

export function resolveRendererOptions(opts: StyledTextRendererOptions): ResolvedRendererOptions {
  const where = "StyledTextRenderer";
  if (typeof opts.string?.render !== "function") {
    invalidProps(`${where}: string must provide render(category)`);
  }
  const scale = opts.scale ?? DEFAULT_PIXEL_SCALE;
  if (!Number.isFinite(scale) || scale <= 0) {
    invalidProps(`${where}: scale must be a positive finite number, got ${String(scale)}`);
  }
  const bg = opts.backgroundColor ?? null;
  return {
    string: opts.string,
    textScaleCategory: assertTextScaleCategory(opts.textScaleCategory, where),
    inset: normalizeInsets(opts.inset, where),
    backgroundColor: bg === null ? null : assertRgb24(bg, `${where}: backgroundColor`),
    scale,
    maximumNumberOfLines: assertMaximumNumberOfLines(opts.maximumNumberOfLines ?? 0, where),
  };
}
