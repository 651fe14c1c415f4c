import type { FontFamily, FontSpec, FontStyle } from "../types/geometry.js";

// Standard-14 faces, shared by PostScript and PDF.
const STANDARD_FACES: Record<FontFamily, Record<FontStyle, string>> = {
  "sans-serif": {
    plain: "Helvetica",
    bold: "Helvetica-Bold",
    italic: "Helvetica-Oblique",
    "bold-italic": "Helvetica-BoldOblique",
  },
  serif: {
    plain: "Times-Roman",
    bold: "Times-Bold",
    italic: "Times-Italic",
    "bold-italic": "Times-BoldItalic",
  },
  monospace: {
    plain: "Courier",
    bold: "Courier-Bold",
    italic: "Courier-Oblique",
    "bold-italic": "Courier-BoldOblique",
  },
};

export function standardFontName(font: FontSpec): string {
  return STANDARD_FACES[font.family][font.style];
}

export function isBold(font: FontSpec): boolean {
  return font.style === "bold" || font.style === "bold-italic";
}

export function isItalic(font: FontSpec): boolean {
  return font.style === "italic" || font.style === "bold-italic";
}

/** Line box height for a font size, rounded up to whole points. */
export function lineHeight(size: number): number {
  return Math.ceil(size * 1.2);
}

/** Distance from the top of a line box to the baseline. */
export function baselineOffset(size: number): number {
  return size * 0.8;
}

export const DEFAULT_FONT: FontSpec = {
  family: "sans-serif",
  style: "plain",
  size: 12,
};
