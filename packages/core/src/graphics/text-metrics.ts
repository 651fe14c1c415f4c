import type { FontFamily, FontSpec, PathSegment } from "../types/geometry.js";
import { isBold } from "./fonts.js";

/**
 * Measures rendered text width. Layout depends on it, so every backend
 * must be fed the same metrics the panel was measured with.
 */
export interface TextMetrics {
  measureText(text: string, font: FontSpec): number;
}

/**
 * Produces glyph outlines for vectorized text.
 * (x, y) is the baseline start in Y-down coordinates.
 */
export interface GlyphOutliner extends TextMetrics {
  outlineText(
    text: string,
    x: number,
    y: number,
    font: FontSpec,
  ): PathSegment[];
}

// Average advance per character, as a fraction of the font size
const AVERAGE_ADVANCE: Record<FontFamily, number> = {
  "sans-serif": 0.55,
  serif: 0.5,
  monospace: 0.6,
};

const BOLD_WIDENING = 1.1;

/**
 * Font-file-free metrics from average glyph advances.
 */
export class EstimatedTextMetrics implements TextMetrics {
  measureText(text: string, font: FontSpec): number {
    const advance =
      AVERAGE_ADVANCE[font.family] * (isBold(font) ? BOLD_WIDENING : 1);
    return Array.from(text).length * font.size * advance;
  }
}
