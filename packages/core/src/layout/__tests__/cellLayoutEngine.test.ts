import { assert, describe, test } from "@styledtext/testkit";
import { StyledTextError } from "../../errors.js";
import type { TextStyle } from "../../style.js";
import { RenderedStorage } from "../../text/storage.js";
import { styledText } from "../../text/styledText.js";
import { pixelAt } from "../bitmap.js";
import { createCellLayoutEngine, layoutCells } from "../cellLayoutEngine.js";
import { createLayoutContainer } from "../container.js";

const INF = Number.POSITIVE_INFINITY;

function storageOf(text: string, style: TextStyle = {}): RenderedStorage {
  return new RenderedStorage(styledText({ size: 16, ...style }).add(text).build().render("large"), "large");
}

function lineTexts(text: string, wrapWidth: number, maxLines = 0): string[] {
  const storage = storageOf(text);
  return layoutCells(storage, wrapWidth, maxLines).lines.map((line) =>
    line.glyphs.map((g) => text.charAt(g.index)).join(""),
  );
}

describe("cell layout", () => {
  test("a single line is cells times half the font size wide", () => {
    const layout = layoutCells(storageOf("Hello world"), INF, 0);
    assert.equal(layout.lines.length, 1);
    assert.equal(layout.width, 88);
    assert.equal(layout.height, 20);
  });

  test("wraps greedily at spaces", () => {
    const layout = layoutCells(storageOf("Hello world"), 50, 0);
    assert.equal(layout.lines.length, 2);
    assert.deepEqual(
      layout.lines.map((l) => l.width),
      [40, 40],
    );
    assert.equal(layout.height, 40);
    assert.deepEqual(lineTexts("Hello world", 50), ["Hello ", "world"]);
  });

  test("breaks words wider than the line between graphemes", () => {
    assert.deepEqual(lineTexts("abcdefgh", 30), ["abc", "def", "gh"]);
    const layout = layoutCells(storageOf("abcdefgh"), 30, 0);
    assert.equal(layout.width, 24);
    assert.equal(layout.height, 60);
  });

  test("newlines force breaks and a trailing newline adds an empty line", () => {
    assert.equal(layoutCells(storageOf("a\nb"), INF, 0).lines.length, 2);
    const trailing = layoutCells(storageOf("a\n"), INF, 0);
    assert.equal(trailing.lines.length, 2);
    assert.equal(trailing.height, 40);
    assert.equal(trailing.width, 8);
  });

  test("empty text has no lines and no size", () => {
    const layout = layoutCells(storageOf(""), INF, 0);
    assert.equal(layout.lines.length, 0);
    assert.equal(layout.width, 0);
    assert.equal(layout.height, 0);
  });

  test("truncates to the line limit", () => {
    const layout = layoutCells(storageOf("Hello world"), 50, 1);
    assert.equal(layout.lines.length, 1);
    assert.equal(layout.height, 20);
  });

  test("trailing spaces do not widen a line", () => {
    assert.equal(layoutCells(storageOf("ab  "), INF, 0).width, 16);
  });

  test("centered lines are offset inside the wrap width", () => {
    const layout = layoutCells(storageOf("ab", { align: "center" }), 40, 0);
    assert.equal(layout.lines[0]?.offset, 12);
    const end = layoutCells(storageOf("ab", { align: "end" }), 40, 0);
    assert.equal(end.lines[0]?.offset, 24);
  });
});

describe("cell layout engine", () => {
  test("measure rounds up to the pixel grid and updates the container", () => {
    const engine = createCellLayoutEngine();
    engine.use(storageOf("abc", { size: 15 }));
    const container = createLayoutContainer(0);
    assert.deepEqual(engine.measure(container, INF, 1), { w: 23, h: 19 });
    assert.deepEqual(container.size, { w: 23, h: 19 });
    assert.deepEqual(engine.measure(container, INF, 2), { w: 22.5, h: 19 });
  });

  test("measure honours the container's line limit", () => {
    const engine = createCellLayoutEngine();
    engine.use(storageOf("Hello world"));
    const container = createLayoutContainer(0);
    assert.deepEqual(engine.measure(container, 50, 1), { w: 40, h: 40 });
    container.maximumNumberOfLines = 1;
    assert.deepEqual(engine.measure(container, 50, 1), { w: 40, h: 20 });
  });

  test("operations without an active storage are rejected", () => {
    const engine = createCellLayoutEngine();
    assert.throws(
      () => engine.measure(createLayoutContainer(0), 10, 1),
      (err: unknown) => err instanceof StyledTextError && err.code === "STX_INVALID_STATE",
    );
  });

  test("rasterize fills background then glyph blocks", () => {
    const engine = createCellLayoutEngine();
    engine.use(storageOf("a b", { fg: 0xff0000 }));
    const container = createLayoutContainer(0);
    const measured = engine.measure(container, INF, 1);
    assert.deepEqual(measured, { w: 24, h: 20 });
    const bitmap = engine.rasterize(container, measured, 1, 0x0000ff);
    assert.equal(bitmap.width, 24);
    assert.equal(bitmap.height, 20);
    assert.deepEqual(pixelAt(bitmap, 0, 0), [0, 0, 255, 255]);
    assert.deepEqual(pixelAt(bitmap, 0, 10), [255, 0, 0, 255]);
    assert.deepEqual(pixelAt(bitmap, 12, 10), [0, 0, 255, 255]);
    assert.deepEqual(pixelAt(bitmap, 20, 10), [255, 0, 0, 255]);
  });

  test("rasterize leaves pixels transparent without a background", () => {
    const engine = createCellLayoutEngine();
    engine.use(storageOf("a", { bg: 0x00ff00 }));
    const container = createLayoutContainer(0);
    const bitmap = engine.rasterize(container, engine.measure(container, INF, 1), 1, null);
    assert.deepEqual(pixelAt(bitmap, 0, 0), [0, 255, 0, 255]);
    assert.deepEqual(pixelAt(bitmap, 0, 10), [0, 0, 0, 255]);

    const plain = createCellLayoutEngine();
    plain.use(storageOf("a"));
    const c2 = createLayoutContainer(0);
    const empty = plain.rasterize(c2, plain.measure(c2, INF, 1), 1, null);
    assert.deepEqual(pixelAt(empty, 0, 0), [0, 0, 0, 0]);
  });

  test("rasterize scales to pixels", () => {
    const engine = createCellLayoutEngine();
    engine.use(storageOf("ab"));
    const container = createLayoutContainer(0);
    const bitmap = engine.rasterize(container, engine.measure(container, INF, 2), 2, null);
    assert.equal(bitmap.width, 32);
    assert.equal(bitmap.height, 40);
    assert.equal(bitmap.data.byteLength, 32 * 40 * 4);
    assert.equal(Object.isFrozen(bitmap), true);
  });

  test("characterIndexAt reports the glyph and the fraction across it", () => {
    const engine = createCellLayoutEngine();
    engine.use(storageOf("Hello world"));
    const container = createLayoutContainer(0);
    engine.measure(container, INF, 1);
    assert.deepEqual(engine.characterIndexAt(container, { x: 4, y: 5 }), { index: 0, fraction: 0.5 });
    assert.deepEqual(engine.characterIndexAt(container, { x: 44, y: 5 }), { index: 5, fraction: 0.5 });
    assert.deepEqual(engine.characterIndexAt(container, { x: -3, y: 5 }), { index: 0, fraction: 0 });
    assert.deepEqual(engine.characterIndexAt(container, { x: 88, y: 5 }), { index: 10, fraction: 1 });
    assert.deepEqual(engine.characterIndexAt(container, { x: 12, y: 100 }), { index: 1, fraction: 0.5 });
  });

  test("characterIndexAt ignores trailing whitespace", () => {
    const engine = createCellLayoutEngine();
    engine.use(storageOf("ab  "));
    const container = createLayoutContainer(0);
    engine.measure(container, INF, 1);
    assert.deepEqual(engine.characterIndexAt(container, { x: 20, y: 5 }), { index: 1, fraction: 1 });
  });

  test("characterIndexAt on empty text is null", () => {
    const engine = createCellLayoutEngine();
    engine.use(storageOf(""));
    const container = createLayoutContainer(0);
    engine.measure(container, INF, 1);
    assert.equal(engine.characterIndexAt(container, { x: 0, y: 0 }), null);
  });
});
