/**
 * packages/core/src/layout/textMeasure.ts: Grapheme segmentation and cell widths.
 *
 * Width rules:
 *   - ASCII control: 0 cells
 *   - Clusters made only of combining marks / format characters: 0 cells
 *   - East Asian wide and fullwidth: 2 cells
 *   - Emoji-presented pictographs: 2 cells
 *   - Everything else: 1 cell
 */

/** A grapheme cluster with its UTF-16 offset in the source text. */
export type Grapheme = Readonly<{ text: string; index: number; cells: 0 | 1 | 2 }>;

/* ========== Grapheme Width Cache ========== */

/** Maximum number of cached grapheme widths before eviction. */
const WIDTH_CACHE_MAX_SIZE = 4096;

const graphemeWidthCache = new Map<string, 0 | 1 | 2>();

export function clearTextMeasureCache(): void {
  graphemeWidthCache.clear();
}

export function getTextMeasureCacheSize(): number {
  return graphemeWidthCache.size;
}

// Inclusive [start, end] ranges of East Asian Wide / Fullwidth scalars.
const WIDE_RANGES: readonly (readonly [number, number])[] = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd],
];

const ZERO_WIDTH_CLUSTER = /^[\p{M}\p{Cf}]+$/u;
const PICTOGRAPHIC = /\p{Extended_Pictographic}/u;
const EMOJI_PRESENTATION = /\p{Emoji_Presentation}/u;
const VARIATION_SELECTOR_16 = "\ufe0f";

function isWide(scalar: number): boolean {
  let lo = 0;
  let hi = WIDE_RANGES.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const range = WIDE_RANGES[mid];
    if (range === undefined) return false;
    if (scalar < range[0]) hi = mid - 1;
    else if (scalar > range[1]) lo = mid + 1;
    else return true;
  }
  return false;
}

function computeGraphemeCells(cluster: string): 0 | 1 | 2 {
  const first = cluster.codePointAt(0);
  if (first === undefined) return 0;
  if (first < 0x20 || first === 0x7f) return 0;
  if (ZERO_WIDTH_CLUSTER.test(cluster)) return 0;
  if (PICTOGRAPHIC.test(cluster)) {
    if (EMOJI_PRESENTATION.test(cluster) || cluster.includes(VARIATION_SELECTOR_16)) return 2;
  }
  return isWide(first) ? 2 : 1;
}

/** Width in cells of a single grapheme cluster. */
export function measureGraphemeCells(cluster: string): 0 | 1 | 2 {
  const cached = graphemeWidthCache.get(cluster);
  if (cached !== undefined) return cached;
  const cells = computeGraphemeCells(cluster);
  if (graphemeWidthCache.size >= WIDTH_CACHE_MAX_SIZE) {
    const oldest = graphemeWidthCache.keys().next();
    if (oldest.done !== true) graphemeWidthCache.delete(oldest.value);
  }
  graphemeWidthCache.set(cluster, cells);
  return cells;
}

let segmenter: Intl.Segmenter | null = null;

function getSegmenter(): Intl.Segmenter {
  if (segmenter === null) segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });
  return segmenter;
}

/** Split text into grapheme clusters with their cell widths. */
export function segmentGraphemes(text: string): Grapheme[] {
  const out: Grapheme[] = [];
  for (const seg of getSegmenter().segment(text)) {
    out.push({ text: seg.segment, index: seg.index, cells: measureGraphemeCells(seg.segment) });
  }
  return out;
}

/** Total cell width of a string (no wrapping). */
export function measureTextCells(text: string): number {
  let total = 0;
  for (const g of segmentGraphemes(text)) total += g.cells;
  return total;
}
