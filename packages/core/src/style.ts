/**
 * packages/core/src/style.ts: Colors and text style types.
 */

import { invalidProps } from "./errors.js";

/** Packed RGB color (0x00RRGGBB). */
export type Rgb24 = number;

export type TextAlign = "start" | "center" | "end";

/**
 * Abstract text style. `size` is the point size at the default ("large")
 * text-scale category; `minSize`/`maxSize` clamp the scaled size.
 */
export type TextStyle = Readonly<{
  font?: string;
  size?: number;
  minSize?: number;
  maxSize?: number;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strikethrough?: boolean;
  fg?: Rgb24;
  bg?: Rgb24 | undefined;
  link?: string | undefined;
  align?: TextAlign;
}>;

/** Concrete attributes of one styled run, resolved for a text-scale category. */
export type TextAttributes = Readonly<{
  font: string;
  size: number;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikethrough: boolean;
  fg: Rgb24;
  bg: Rgb24 | null;
  link: string | null;
  align: TextAlign;
}>;

export const DEFAULT_FONT = "system";
export const DEFAULT_FONT_SIZE = 16;
export const DEFAULT_FG: Rgb24 = 0x000000;

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export function rgbR(value: Rgb24): number {
  return (value >>> 16) & 0xff;
}

export function rgbG(value: Rgb24): number {
  return (value >>> 8) & 0xff;
}

export function rgbB(value: Rgb24): number {
  return value & 0xff;
}

export function isRgb24(value: unknown): value is Rgb24 {
  return (
    typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 0xffffff
  );
}

export function assertRgb24(value: unknown, where: string): Rgb24 {
  if (!isRgb24(value)) {
    invalidProps(`${where}: expected a packed 0xRRGGBB color, got ${String(value)}`);
  }
  return value;
}
