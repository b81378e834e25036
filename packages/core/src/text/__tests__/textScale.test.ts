import { assert, describe, test } from "@styledtext/testkit";
import { StyledTextError } from "../../errors.js";
import {
  TEXT_SCALE_CATEGORIES,
  assertTextScaleCategory,
  isTextScaleCategory,
  scaledFontSize,
  textScaleMultiplier,
} from "../textScale.js";

function near(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${String(actual)} to be ${String(expected)}`);
}

describe("text scale", () => {
  test("lists twelve categories from smallest to largest", () => {
    assert.equal(TEXT_SCALE_CATEGORIES.length, 12);
    assert.equal(TEXT_SCALE_CATEGORIES[0], "extraSmall");
    assert.equal(TEXT_SCALE_CATEGORIES[11], "accessibilityExtraExtraExtraLarge");
    let prev = 0;
    for (const category of TEXT_SCALE_CATEGORIES) {
      const m = textScaleMultiplier(category);
      assert.ok(m > prev);
      prev = m;
    }
  });

  test("large is the identity", () => {
    assert.equal(textScaleMultiplier("large"), 1);
    assert.equal(scaledFontSize(16, "large"), 16);
  });

  test("scales by body points over seventeen", () => {
    near(scaledFontSize(17, "accessibilityExtraExtraExtraLarge"), 53);
    near(scaledFontSize(17, "extraSmall"), 14);
    near(scaledFontSize(34, "accessibilityLarge"), 66);
  });

  test("clamps to minimum and maximum sizes", () => {
    assert.equal(scaledFontSize(16, "accessibilityLarge", undefined, 20), 20);
    assert.equal(scaledFontSize(10, "extraSmall", 12), 12);
    assert.equal(scaledFontSize(16, "large", 10, 20), 16);
  });

  test("recognizes only known categories", () => {
    assert.equal(isTextScaleCategory("medium"), true);
    assert.equal(isTextScaleCategory("huge"), false);
    assert.equal(isTextScaleCategory("toString"), false);
    assert.equal(isTextScaleCategory(3), false);
    assert.throws(
      () => assertTextScaleCategory("huge", "test"),
      (err: unknown) => err instanceof StyledTextError && err.code === "STX_INVALID_PROPS",
    );
  });
});
