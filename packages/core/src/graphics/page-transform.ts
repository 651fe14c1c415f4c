import type {
  AffineTransform,
  Bounds,
  PageSize,
  Point,
} from "../types/geometry.js";
import type { DrawingContext } from "./drawing-context.js";

/**
 * Where the destination page puts its origin.
 * Sources are always Y-down (screen addressing); a bottom-left page is Y-up.
 */
export type PageOrigin = "top-left" | "bottom-left";

/**
 * Scale factor mapping a source extent onto a page extent.
 * A zero or negative extent maps 1:1 instead of dividing by zero.
 */
function axisScale(pageExtent: number, min: number, max: number): number {
  const extent = max - min;
  return extent > 0 ? pageExtent / extent : 1;
}

/**
 * Create the matrix that maps the source bounding box onto the full page
 * rectangle. The scale is independent per axis, so the corners land exactly
 * on the page corners.
 */
export function createPageTransform(
  bounds: Bounds,
  page: PageSize,
  origin: PageOrigin,
): AffineTransform {
  const sx = axisScale(page.width, bounds.minX, bounds.maxX);
  const sy = axisScale(page.height, bounds.minY, bounds.maxY);

  if (origin === "top-left") {
    return {
      a: sx,
      b: 0,
      c: 0,
      d: sy,
      e: -bounds.minX * sx,
      f: -bounds.minY * sy,
    };
  }

  // Flip Y: source minY lands on the top edge of a Y-up page.
  return {
    a: sx,
    b: 0,
    c: 0,
    d: -sy,
    e: -bounds.minX * sx,
    f: page.height + bounds.minY * sy,
  };
}

/**
 * Convert a point from source coordinates to page coordinates.
 */
export function applyTransform(matrix: AffineTransform, point: Point): Point {
  return {
    x: matrix.a * point.x + matrix.c * point.y + matrix.e,
    y: matrix.b * point.x + matrix.d * point.y + matrix.f,
  };
}

/**
 * Calculate and apply a global transform from source coordinates to
 * page coordinates on the given drawing context.
 */
export function applySourceToDestinationTransform(
  dc: DrawingContext,
  bounds: Bounds,
  page: PageSize,
  origin: PageOrigin = "top-left",
): AffineTransform {
  const matrix = createPageTransform(bounds, page, origin);
  dc.transform(matrix);
  return matrix;
}
