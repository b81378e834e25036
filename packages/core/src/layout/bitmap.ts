/**
 * packages/core/src/layout/bitmap.ts: RGBA bitmaps produced by rasterization.
 */

import { type Rgb24, rgbB, rgbG, rgbR } from "../style.js";

export type Bitmap = Readonly<{
  /** Pixel width. */
  width: number;
  /** Pixel height. */
  height: number;
  /** Pixels per logical unit. */
  scale: number;
  /** RGBA, row-major, `width * height * 4` bytes. */
  data: Uint8ClampedArray;
}>;

export function createBitmap(width: number, height: number, scale: number): Bitmap {
  const w = Math.max(0, Math.trunc(width));
  const h = Math.max(0, Math.trunc(height));
  return Object.freeze({ width: w, height: h, scale, data: new Uint8ClampedArray(w * h * 4) });
}

export function bitmapByteSize(bitmap: Bitmap): number {
  return bitmap.data.byteLength;
}

/** Fill a pixel rectangle (clipped to the bitmap) with an opaque color. */
export function fillRect(
  bitmap: Bitmap,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  color: Rgb24,
): void {
  const left = Math.max(0, Math.min(bitmap.width, Math.floor(x0)));
  const right = Math.max(0, Math.min(bitmap.width, Math.ceil(x1)));
  const top = Math.max(0, Math.min(bitmap.height, Math.floor(y0)));
  const bottom = Math.max(0, Math.min(bitmap.height, Math.ceil(y1)));
  const r = rgbR(color);
  const g = rgbG(color);
  const b = rgbB(color);
  const data = bitmap.data;
  for (let y = top; y < bottom; y++) {
    let off = (y * bitmap.width + left) * 4;
    for (let x = left; x < right; x++) {
      data[off] = r;
      data[off + 1] = g;
      data[off + 2] = b;
      data[off + 3] = 255;
      off += 4;
    }
  }
}

/** Read one pixel as [r, g, b, a]; out-of-range reads are transparent. */
export function pixelAt(bitmap: Bitmap, x: number, y: number): readonly [number, number, number, number] {
  if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) return [0, 0, 0, 0];
  const off = (y * bitmap.width + x) * 4;
  const d = bitmap.data;
  return [d[off] ?? 0, d[off + 1] ?? 0, d[off + 2] ?? 0, d[off + 3] ?? 0];
}
