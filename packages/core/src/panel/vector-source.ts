import type { DrawingContext } from "../graphics/drawing-context.js";
import type { Bounds } from "../types/geometry.js";

/**
 * Anything an exporter can replay onto a drawing context.
 * `vectorize` returns false for a partial or failed render; exporters pass
 * that through as the outcome rather than throwing.
 */
export interface VectorSource {
  getBounds(): Bounds;
  vectorize(dc: DrawingContext): boolean;
}

/**
 * A source the compositor can place on a page: it knows its rendered size
 * and takes the colors the compositor hands down.
 */
export interface CompositeRegion extends VectorSource {
  getWidth(): number;
  getHeight(): number;
  setBackground(color: string): void;
  setForeground(color: string): void;
}
