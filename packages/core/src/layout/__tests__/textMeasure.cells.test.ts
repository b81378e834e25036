import { assert, describe, test } from "@styledtext/testkit";
import {
  clearTextMeasureCache,
  getTextMeasureCacheSize,
  measureGraphemeCells,
  measureTextCells,
  segmentGraphemes,
} from "../textMeasure.js";

describe("text measurement in cells", () => {
  test("ASCII is one cell per character", () => {
    assert.equal(measureTextCells("abc"), 3);
    assert.equal(measureTextCells(""), 0);
  });

  test("East Asian wide characters take two cells", () => {
    assert.equal(measureTextCells("日本"), 4);
  });

  test("combining sequences collapse into one cell", () => {
    assert.equal(measureTextCells("e\u0301"), 1);
    assert.equal(measureGraphemeCells("\u0301"), 0);
  });

  test("emoji presentation takes two cells", () => {
    assert.equal(measureGraphemeCells("😀"), 2);
    assert.equal(measureGraphemeCells("\u2764"), 1);
    assert.equal(measureGraphemeCells("\u2764\ufe0f"), 2);
  });

  test("controls and format characters take no cells", () => {
    assert.equal(measureGraphemeCells("\t"), 0);
    assert.equal(measureGraphemeCells("\u200b"), 0);
  });

  test("segments report UTF-16 offsets", () => {
    assert.deepEqual(
      segmentGraphemes("a😀b").map((g) => [g.text, g.index, g.cells]),
      [
        ["a", 0, 1],
        ["😀", 1, 2],
        ["b", 3, 1],
      ],
    );
  });

  test("width cache can be cleared", () => {
    measureTextCells("xyz");
    assert.ok(getTextMeasureCacheSize() > 0);
    clearTextMeasureCache();
    assert.equal(getTextMeasureCacheSize(), 0);
  });
});
