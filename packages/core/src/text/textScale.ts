/**
 * packages/core/src/text/textScale.ts: Accessibility text-scale categories.
 *
 * Each category pins a body point size; styles scale by `points / 17` so the
 * default "large" category leaves sizes untouched.
 */

import { invalidProps } from "../errors.js";

export type TextScaleCategory =
  | "extraSmall"
  | "small"
  | "medium"
  | "large"
  | "extraLarge"
  | "extraExtraLarge"
  | "extraExtraExtraLarge"
  | "accessibilityMedium"
  | "accessibilityLarge"
  | "accessibilityExtraLarge"
  | "accessibilityExtraExtraLarge"
  | "accessibilityExtraExtraExtraLarge";

export const DEFAULT_TEXT_SCALE_CATEGORY: TextScaleCategory = "large";

const BASE_BODY_POINTS = 17;

const BODY_POINTS: Readonly<Record<TextScaleCategory, number>> = Object.freeze({
  extraSmall: 14,
  small: 15,
  medium: 16,
  large: 17,
  extraLarge: 19,
  extraExtraLarge: 21,
  extraExtraExtraLarge: 23,
  accessibilityMedium: 28,
  accessibilityLarge: 33,
  accessibilityExtraLarge: 40,
  accessibilityExtraExtraLarge: 47,
  accessibilityExtraExtraExtraLarge: 53,
});

export const TEXT_SCALE_CATEGORIES: readonly TextScaleCategory[] = Object.freeze(
  Object.keys(BODY_POINTS).filter(isTextScaleCategory),
);

export function isTextScaleCategory(value: unknown): value is TextScaleCategory {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(BODY_POINTS, value);
}

export function assertTextScaleCategory(value: unknown, where: string): TextScaleCategory {
  if (!isTextScaleCategory(value)) {
    invalidProps(`${where}: unknown text-scale category "${String(value)}"`);
  }
  return value;
}

export function textScaleMultiplier(category: TextScaleCategory): number {
  return BODY_POINTS[category] / BASE_BODY_POINTS;
}

/** Scale a point size for a category, clamped to the optional bounds. */
export function scaledFontSize(
  size: number,
  category: TextScaleCategory,
  minSize?: number,
  maxSize?: number,
): number {
  let scaled = category === "large" ? size : size * textScaleMultiplier(category);
  if (minSize !== undefined && scaled < minSize) scaled = minSize;
  if (maxSize !== undefined && scaled > maxSize) scaled = maxSize;
  return scaled;
}
