import type {
  AffineTransform,
  ColorMode,
  FontSpec,
  PathSegment,
  Point,
  TextRenderingMode,
} from "../types/geometry.js";

/**
 * Abstract drawing interface for rendering primitives.
 * Enables multiple output backends (SVG, EPS, PDF) from the same paint logic.
 * Colors are CSS hex strings; each backend converts them for its color mode.
 */
export interface StyleOpts {
  stroke?: string;
  strokeWidth?: number;
  fill?: string;
}

export interface TextOpts {
  font: FontSpec;
  fill?: string;
}

export interface DrawingContext {
  rect(
    x: number,
    y: number,
    width: number,
    height: number,
    opts?: StyleOpts,
  ): void;
  /** Draw text with its baseline starting at (x, y). */
  text(x: number, y: number, content: string, opts: TextOpts): void;
  polyline(points: Point[], opts?: StyleOpts): void;
  path(segments: PathSegment[], opts?: StyleOpts): void;

  /** Move the origin. Stays in effect until the enclosing group closes. */
  translate(dx: number, dy: number): void;
  /** Concatenate a matrix onto the current transform. */
  transform(matrix: AffineTransform): void;

  /** Open a group; closing it restores the transform in effect when it opened. */
  openGroup(attrs?: Record<string, string>): void;
  closeGroup(): void;

  setColorMode(mode: ColorMode): void;
  setTextRenderingMode(mode: TextRenderingMode): void;
}
