// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Axis-aligned bounding box, in source units.
 * Sources report their extent this way rather than as origin + size.
 */
export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/** Page dimensions in points (1/72 inch). */
export type PageSize = Size;

/**
 * 2D affine matrix in the SVG/PDF/PostScript convention:
 *   x' = a*x + c*y + e
 *   y' = b*x + d*y + f
 */
export interface AffineTransform {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

// ---- Path data (used for vectorized text outlines) ----

export type PathSegment =
  | { type: "M"; x: number; y: number }
  | { type: "L"; x: number; y: number }
  | { type: "Q"; x1: number; y1: number; x: number; y: number }
  | {
      type: "C";
      x1: number;
      y1: number;
      x2: number;
      y2: number;
      x: number;
      y: number;
    }
  | { type: "Z" };

// ---- Rendering options ----

export type ColorMode = "rgb" | "cmyk";

/** "vector" draws glyph outlines as paths; "text" emits native text. */
export type TextRenderingMode = "vector" | "text";

export type FontFamily = "sans-serif" | "serif" | "monospace";
export type FontStyle = "plain" | "bold" | "italic" | "bold-italic";

export interface FontSpec {
  family: FontFamily;
  style: FontStyle;
  size: number;
}
