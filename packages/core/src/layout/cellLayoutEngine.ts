/**
 * packages/core/src/layout/cellLayoutEngine.ts: Deterministic cell-grid layout engine.
 *
 * Every grapheme advances by `cells * fontSize * 0.5` logical units and every
 * line is `max fontSize * 1.25` tall. Wrapping is greedy at spaces; words wider
 * than the wrap width break between graphemes; "\n" forces a break. Trailing
 * whitespace hangs past the line end: it neither widens the line nor
 * participates in hit-testing.
 *
 * Rasterization draws each visible grapheme as a solid block in its run's
 * foreground color over an optional background fill. It is a stand-in for a
 * real shaper with the same call contract, not a typesetter.
 */

import { StyledTextError } from "../errors.js";
import type { Rgb24, TextAttributes } from "../style.js";
import type { RenderedStorage } from "../text/storage.js";
import { type Bitmap, createBitmap, fillRect } from "./bitmap.js";
import type { LayoutContainer } from "./container.js";
import type { CharacterHit, TextLayoutEngine } from "./engine.js";
import { segmentGraphemes } from "./textMeasure.js";
import { type Point, type Size, ceilToScale, size as makeSize } from "./types.js";

export const CELL_ADVANCE_EM = 0.5;
export const LINE_HEIGHT_MULTIPLE = 1.25;

type GlyphKind = "visible" | "space" | "newline";

export type LaidGlyph = Readonly<{
  index: number;
  /** Offset from the line's left edge (before alignment). */
  x: number;
  advance: number;
  kind: GlyphKind;
  attributes: TextAttributes;
}>;

export type LaidLine = Readonly<{
  glyphs: readonly LaidGlyph[];
  /** Glyphs that hit-testing considers: no trailing whitespace, no zero advance. */
  hittable: readonly LaidGlyph[];
  /** Alignment offset of the line inside the layout width. */
  offset: number;
  top: number;
  width: number;
  height: number;
}>;

export type CellLayout = Readonly<{
  lines: readonly LaidLine[];
  width: number;
  height: number;
}>;

type Token =
  | Readonly<{ kind: "word"; glyphs: readonly PendingGlyph[]; width: number }>
  | Readonly<{ kind: "space"; glyph: PendingGlyph }>
  | Readonly<{ kind: "newline"; glyph: PendingGlyph }>;

type PendingGlyph = Readonly<{
  index: number;
  advance: number;
  kind: GlyphKind;
  attributes: TextAttributes;
}>;

const NEWLINE = /^(?:\r\n|\r|\n)$/u;
const WHITESPACE = /^\s+$/u;

function tokenize(storage: RenderedStorage): Token[] {
  const tokens: Token[] = [];
  let word: PendingGlyph[] = [];
  let wordWidth = 0;
  const flushWord = (): void => {
    if (word.length === 0) return;
    tokens.push({ kind: "word", glyphs: word, width: wordWidth });
    word = [];
    wordWidth = 0;
  };

  for (const g of segmentGraphemes(storage.text)) {
    const attributes = storage.attributesAt(g.index);
    if (attributes === null) continue;
    const advance = g.cells * attributes.size * CELL_ADVANCE_EM;
    if (NEWLINE.test(g.text)) {
      flushWord();
      tokens.push({ kind: "newline", glyph: { index: g.index, advance: 0, kind: "newline", attributes } });
    } else if (WHITESPACE.test(g.text)) {
      flushWord();
      tokens.push({ kind: "space", glyph: { index: g.index, advance, kind: "space", attributes } });
    } else {
      word.push({ index: g.index, advance, kind: "visible", attributes });
      wordWidth += advance;
    }
  }
  flushWord();
  return tokens;
}

type LineBuilder = {
  glyphs: LaidGlyph[];
  x: number;
  hasVisible: boolean;
};

function newLine(): LineBuilder {
  return { glyphs: [], x: 0, hasVisible: false };
}

function place(line: LineBuilder, g: PendingGlyph): void {
  line.glyphs.push({ ...g, x: line.x });
  line.x += g.advance;
  if (g.kind === "visible") line.hasVisible = true;
}

function breakLines(tokens: readonly Token[], wrapWidth: number): LineBuilder[] {
  const lines: LineBuilder[] = [];
  let cur = newLine();
  let endedWithNewline = false;

  for (const t of tokens) {
    endedWithNewline = false;
    if (t.kind === "newline") {
      place(cur, t.glyph);
      lines.push(cur);
      cur = newLine();
      endedWithNewline = true;
      continue;
    }
    if (t.kind === "space") {
      place(cur, t.glyph);
      continue;
    }
    if (cur.hasVisible && cur.x + t.width > wrapWidth) {
      lines.push(cur);
      cur = newLine();
    }
    if (cur.x + t.width <= wrapWidth) {
      for (const g of t.glyphs) place(cur, g);
      continue;
    }
    // Word wider than the line: break between graphemes.
    for (const g of t.glyphs) {
      if (cur.x > 0 && cur.x + g.advance > wrapWidth) {
        lines.push(cur);
        cur = newLine();
      }
      place(cur, g);
    }
  }

  if (cur.glyphs.length > 0 || endedWithNewline) lines.push(cur);
  return lines;
}

function finishLines(
  built: readonly LineBuilder[],
  storage: RenderedStorage,
  wrapWidth: number,
): CellLayout {
  const measured = built.map((line) => {
    let end = line.glyphs.length;
    while (end > 0) {
      const g = line.glyphs[end - 1];
      if (g === undefined || g.kind === "visible") break;
      end--;
    }
    const content = line.glyphs.slice(0, end);
    const last = content[content.length - 1];
    const width = last === undefined ? 0 : last.x + last.advance;
    let fontSize = 0;
    for (const g of line.glyphs) fontSize = Math.max(fontSize, g.attributes.size);
    if (line.glyphs.length === 0) {
      // Empty line after a trailing newline: size of the last character.
      fontSize = storage.attributesAt(storage.text.length - 1)?.size ?? 0;
    }
    return {
      glyphs: line.glyphs,
      hittable: content.filter((g) => g.advance > 0),
      width,
      height: fontSize * LINE_HEIGHT_MULTIPLE,
    };
  });

  let maxWidth = 0;
  for (const line of measured) maxWidth = Math.max(maxWidth, line.width);
  const alignWidth = Number.isFinite(wrapWidth) ? wrapWidth : maxWidth;

  const lines: LaidLine[] = [];
  let top = 0;
  for (const line of measured) {
    const align = line.glyphs[0]?.attributes.align ?? "start";
    const slack = Math.max(0, alignWidth - line.width);
    const offset = align === "center" ? slack / 2 : align === "end" ? slack : 0;
    lines.push({ ...line, offset, top });
    top += line.height;
  }
  return { lines, width: maxWidth, height: top };
}

/** Lay out a storage at a wrap width, keeping at most `maxLines` lines (0 = all). */
export function layoutCells(storage: RenderedStorage, wrapWidth: number, maxLines: number): CellLayout {
  let built = breakLines(tokenize(storage), wrapWidth);
  if (maxLines > 0 && built.length > maxLines) built = built.slice(0, maxLines);
  return finishLines(built, storage, wrapWidth);
}

type LayoutMemo = Readonly<{
  storage: RenderedStorage;
  wrapWidth: number;
  maxLines: number;
  layout: CellLayout;
}>;

export class CellLayoutEngine implements TextLayoutEngine {
  private active: RenderedStorage | null = null;
  private memo: LayoutMemo | null = null;

  use(storage: RenderedStorage): void {
    storage.bind(this);
    this.active = storage;
  }

  measure(container: LayoutContainer, width: number, scale: number): Size {
    container.size = { w: width, h: Number.POSITIVE_INFINITY };
    const layout = this.layoutFor(container);
    const measured = makeSize(ceilToScale(layout.width, scale), ceilToScale(layout.height, scale));
    container.size = measured;
    return measured;
  }

  rasterize(
    container: LayoutContainer,
    size: Size,
    scale: number,
    backgroundColor: Rgb24 | null,
  ): Bitmap {
    container.size = size;
    const layout = this.layoutFor(container);
    const bitmap = createBitmap(Math.ceil(size.w * scale), Math.ceil(size.h * scale), scale);
    if (backgroundColor !== null) {
      fillRect(bitmap, 0, 0, bitmap.width, bitmap.height, backgroundColor);
    }
    for (const line of layout.lines) {
      const bottom = line.top + line.height;
      for (const g of line.glyphs) {
        if (g.advance <= 0) continue;
        const x0 = line.offset + g.x;
        const x1 = x0 + g.advance;
        if (g.attributes.bg !== null) {
          fillRect(bitmap, x0 * scale, line.top * scale, x1 * scale, bottom * scale, g.attributes.bg);
        }
        if (g.kind === "visible") {
          const glyphTop = bottom - g.attributes.size;
          fillRect(bitmap, x0 * scale, glyphTop * scale, x1 * scale, bottom * scale, g.attributes.fg);
        }
      }
    }
    return bitmap;
  }

  characterIndexAt(container: LayoutContainer, point: Point): CharacterHit | null {
    const layout = this.layoutFor(container);
    const lines = layout.lines;
    if (lines.length === 0) return null;

    let line = lines[lines.length - 1];
    for (const candidate of lines) {
      if (point.y < candidate.top + candidate.height) {
        line = candidate;
        break;
      }
    }
    if (line === undefined) return null;
    const glyphs = line.hittable;
    const first = glyphs[0];
    const last = glyphs[glyphs.length - 1];
    if (first === undefined || last === undefined) return null;

    const x = point.x - line.offset;
    if (x < first.x) return { index: first.index, fraction: 0 };
    for (const g of glyphs) {
      if (x < g.x + g.advance) return { index: g.index, fraction: (x - g.x) / g.advance };
    }
    return { index: last.index, fraction: 1 };
  }

  /** Current layout for the active storage at the container's width. */
  layoutFor(container: LayoutContainer): CellLayout {
    const storage = this.active;
    if (storage === null) {
      throw new StyledTextError("STX_INVALID_STATE", "CellLayoutEngine: no active storage");
    }
    const wrapWidth = container.size.w;
    const maxLines = container.maximumNumberOfLines;
    const memo = this.memo;
    if (
      memo !== null &&
      memo.storage === storage &&
      memo.wrapWidth === wrapWidth &&
      memo.maxLines === maxLines
    ) {
      return memo.layout;
    }
    const layout = layoutCells(storage, wrapWidth, maxLines);
    this.memo = { storage, wrapWidth, maxLines, layout };
    return layout;
  }
}

export function createCellLayoutEngine(): CellLayoutEngine {
  return new CellLayoutEngine();
}
