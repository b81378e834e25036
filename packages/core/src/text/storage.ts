/**
 * packages/core/src/text/storage.ts: Scale-resolved text storage.
 *
 * One RenderedStorage holds a StyledTextRun for a single text-scale category.
 * Its fingerprint is a structural hash of text and attributes, so identical
 * content yields identical cache keys across renderers and processes.
 *
 * A storage binds to exactly one layout engine for its whole life.
 */

import { StyledTextError } from "../errors.js";
import type { TextLayoutEngine } from "../layout/engine.js";
import type { TextAttributes } from "../style.js";
import type { AttributeRun, StyledTextRun } from "./styledText.js";
import type { TextScaleCategory } from "./textScale.js";

const FNV_OFFSET = 0x811c9dc5;
const FNV_OFFSET_ALT = 0x050c5d1f;
const FNV_PRIME = 0x01000193;

type Fnv2 = { a: number; b: number };

function mixString(h: Fnv2, value: string): void {
  let a = h.a;
  let b = h.b;
  for (let i = 0; i < value.length; i++) {
    const c = value.charCodeAt(i);
    a ^= c;
    a = Math.imul(a, FNV_PRIME) >>> 0;
    b ^= c;
    b = Math.imul(b, FNV_PRIME) >>> 0;
  }
  // Field separator so ("ab","c") and ("a","bc") differ.
  a = Math.imul(a ^ 0x1f, FNV_PRIME) >>> 0;
  b = Math.imul(b ^ 0x1f, FNV_PRIME) >>> 0;
  h.a = a;
  h.b = b;
}

function serializeAttributes(attrs: TextAttributes): string {
  return [
    attrs.font,
    String(attrs.size),
    attrs.bold ? "b" : "",
    attrs.italic ? "i" : "",
    attrs.underline ? "u" : "",
    attrs.strikethrough ? "s" : "",
    String(attrs.fg),
    attrs.bg === null ? "-" : String(attrs.bg),
    attrs.link ?? "-",
    attrs.align,
  ].join(",");
}

function toHex32(v: number): string {
  return (v >>> 0).toString(16).padStart(8, "0");
}

/** Structural content fingerprint of a styled run. */
export function fingerprintStyledRun(run: StyledTextRun): string {
  const h: Fnv2 = { a: FNV_OFFSET, b: FNV_OFFSET_ALT };
  mixString(h, run.text);
  for (const r of run.runs) {
    mixString(h, `${String(r.start)}:${String(r.end)}`);
    mixString(h, serializeAttributes(r.attributes));
  }
  return `${toHex32(h.a)}${toHex32(h.b)}:${String(run.text.length)}`;
}

export class RenderedStorage {
  readonly category: TextScaleCategory;
  readonly run: StyledTextRun;
  readonly fingerprint: string;
  private boundEngine: TextLayoutEngine | null = null;

  constructor(run: StyledTextRun, category: TextScaleCategory) {
    this.run = run;
    this.category = category;
    this.fingerprint = fingerprintStyledRun(run);
  }

  get text(): string {
    return this.run.text;
  }

  get engine(): TextLayoutEngine | null {
    return this.boundEngine;
  }

  /** Attach to a layout engine. Rebinding to another engine is rejected. */
  bind(engine: TextLayoutEngine): void {
    if (this.boundEngine === engine) return;
    if (this.boundEngine !== null) {
      throw new StyledTextError(
        "STX_STORAGE_BOUND",
        "RenderedStorage.bind: storage is already bound to a different layout engine",
      );
    }
    this.boundEngine = engine;
  }

  runAt(index: number): AttributeRun | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.run.text.length) return null;
    // Runs are sorted and contiguous; binary search by start offset.
    const runs = this.run.runs;
    let lo = 0;
    let hi = runs.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const r = runs[mid];
      if (r === undefined) return null;
      if (index < r.start) hi = mid - 1;
      else if (index >= r.end) lo = mid + 1;
      else return r;
    }
    return null;
  }

  attributesAt(index: number): TextAttributes | null {
    return this.runAt(index)?.attributes ?? null;
  }
}
