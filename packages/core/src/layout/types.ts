/**
 * packages/core/src/layout/types.ts: Geometry primitives.
 *
 * All geometry is in logical units; bitmaps convert to pixels through the
 * renderer's pixel scale.
 */

import { invalidProps } from "../errors.js";

/** Size dimensions (width and height) in logical units. */
export type Size = Readonly<{ w: number; h: number }>;

/** Point in the renderer's logical coordinate space. */
export type Point = Readonly<{ x: number; y: number }>;

/** Insets applied around measured text. */
export type EdgeInsets = Readonly<{ top: number; left: number; bottom: number; right: number }>;

export const ZERO_INSETS: EdgeInsets = Object.freeze({ top: 0, left: 0, bottom: 0, right: 0 });

export function size(w: number, h: number): Size {
  return Object.freeze({ w, h });
}

/** Grow a size by the insets on all four edges. */
export function expandByInset(s: Size, inset: EdgeInsets): Size {
  return size(s.w + inset.left + inset.right, s.h + inset.top + inset.bottom);
}

/** Round a logical length up to the pixel grid of `scale`. */
export function ceilToScale(value: number, scale: number): number {
  return Math.ceil(value * scale) / scale;
}

export function normalizeInsets(raw: Partial<EdgeInsets> | undefined, where: string): EdgeInsets {
  if (raw === undefined) return ZERO_INSETS;
  const out = {
    top: raw.top ?? 0,
    left: raw.left ?? 0,
    bottom: raw.bottom ?? 0,
    right: raw.right ?? 0,
  };
  for (const [edge, v] of Object.entries(out)) {
    if (!Number.isFinite(v) || v < 0) {
      invalidProps(`${where}: inset.${edge} must be a non-negative finite number, got ${String(v)}`);
    }
  }
  return Object.freeze(out);
}
