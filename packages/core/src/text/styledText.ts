/**
 * packages/core/src/text/styledText.ts: Abstract styled text and its builder.
 *
 * A StyledTextString is width- and scale-independent. Rendering it for a
 * text-scale category yields a StyledTextRun: the text plus contiguous,
 * merged attribute runs addressed by UTF-16 offsets.
 *
 * @example
 * ```typescript
 * const string = styledText({ size: 16 })
 *   .add("Hello ", { bold: true })
 *   .add("world", { fg: rgb(200, 0, 0) })
 *   .build();
 * const run = string.render("accessibilityLarge");
 * ```
 */

import { invalidProps } from "../errors.js";
import {
  DEFAULT_FG,
  DEFAULT_FONT,
  DEFAULT_FONT_SIZE,
  type TextAttributes,
  type TextStyle,
  assertRgb24,
} from "../style.js";
import { type TextScaleCategory, scaledFontSize } from "./textScale.js";

export type StyledTextPart = Readonly<{ text: string; style: TextStyle }>;

export type AttributeRun = Readonly<{ start: number; end: number; attributes: TextAttributes }>;

export type StyledTextRun = Readonly<{
  text: string;
  runs: readonly AttributeRun[];
}>;

/** Anything that can produce a concrete styled run for a category. */
export type StyledTextSource = Readonly<{
  render(category: TextScaleCategory): StyledTextRun;
}>;

function resolveAttributes(style: TextStyle, category: TextScaleCategory): TextAttributes {
  return Object.freeze({
    font: style.font ?? DEFAULT_FONT,
    size: scaledFontSize(style.size ?? DEFAULT_FONT_SIZE, category, style.minSize, style.maxSize),
    bold: style.bold === true,
    italic: style.italic === true,
    underline: style.underline === true,
    strikethrough: style.strikethrough === true,
    fg: style.fg ?? DEFAULT_FG,
    bg: style.bg ?? null,
    link: style.link ?? null,
    align: style.align ?? "start",
  });
}

export function attributesEqual(a: TextAttributes, b: TextAttributes): boolean {
  return (
    a.font === b.font &&
    a.size === b.size &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underline === b.underline &&
    a.strikethrough === b.strikethrough &&
    a.fg === b.fg &&
    a.bg === b.bg &&
    a.link === b.link &&
    a.align === b.align
  );
}

export class StyledTextString implements StyledTextSource {
  readonly parts: readonly StyledTextPart[];

  constructor(parts: readonly StyledTextPart[]) {
    this.parts = Object.freeze(parts.map((p) => Object.freeze({ text: p.text, style: p.style })));
  }

  get allText(): string {
    let out = "";
    for (const part of this.parts) out += part.text;
    return out;
  }

  render(category: TextScaleCategory): StyledTextRun {
    const runs: AttributeRun[] = [];
    let text = "";
    for (const part of this.parts) {
      if (part.text.length === 0) continue;
      const attributes = resolveAttributes(part.style, category);
      const start = text.length;
      text += part.text;
      const prev = runs[runs.length - 1];
      if (prev !== undefined && attributesEqual(prev.attributes, attributes)) {
        runs[runs.length - 1] = Object.freeze({ start: prev.start, end: text.length, attributes });
      } else {
        runs.push(Object.freeze({ start, end: text.length, attributes }));
      }
    }
    return Object.freeze({ text, runs: Object.freeze(runs) });
  }
}

function validateStyle(style: TextStyle): TextStyle {
  for (const key of ["size", "minSize", "maxSize"] as const) {
    const v = style[key];
    if (v !== undefined && (!Number.isFinite(v) || v <= 0)) {
      invalidProps(`styledText: ${key} must be a positive finite number, got ${String(v)}`);
    }
  }
  if (style.fg !== undefined) assertRgb24(style.fg, "styledText: fg");
  if (style.bg !== undefined) assertRgb24(style.bg, "styledText: bg");
  return style;
}

/**
 * Fluent builder. Every add() inherits the current style and overrides it
 * with the given fields; save()/restore() push and pop the current style.
 */
export class StyledTextBuilder {
  private readonly parts: StyledTextPart[] = [];
  private readonly stack: TextStyle[] = [];
  private current: TextStyle;

  constructor(base: TextStyle = {}) {
    this.current = validateStyle(base);
  }

  add(text: string, style?: TextStyle): this {
    const merged = style === undefined ? this.current : { ...this.current, ...validateStyle(style) };
    this.parts.push({ text, style: merged });
    return this;
  }

  addNewline(): this {
    return this.add("\n");
  }

  /** Override the current style for subsequent add() calls. */
  style(style: TextStyle): this {
    this.current = { ...this.current, ...validateStyle(style) };
    return this;
  }

  save(): this {
    this.stack.push(this.current);
    return this;
  }

  restore(): this {
    const prev = this.stack.pop();
    if (prev === undefined) {
      invalidProps("styledText: restore() without a matching save()");
    }
    this.current = prev;
    return this;
  }

  build(): StyledTextString {
    return new StyledTextString(this.parts);
  }
}

export function styledText(base?: TextStyle): StyledTextBuilder {
  return new StyledTextBuilder(base);
}
