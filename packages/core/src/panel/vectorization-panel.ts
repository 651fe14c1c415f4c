import {
  BLACK,
  WHITE,
  getForegroundFromBackground,
} from "../graphics/color.js";
import type { DrawingContext } from "../graphics/drawing-context.js";
import {
  EstimatedTextMetrics,
  type TextMetrics,
} from "../graphics/text-metrics.js";
import type { Bounds, Size } from "../types/geometry.js";
import type { Component } from "./component.js";
import type { CompositeRegion } from "./vector-source.js";

/** "page" stacks children top-to-bottom; "line" places them left-to-right. */
export type LayoutAxis = "page" | "line";

export interface PanelOptions {
  id?: string;
  /** Uniform empty border on all four sides */
  padding?: number;
  axis?: LayoutAxis;
  metrics?: TextMetrics;
}

const DEFAULT_PADDING = 10;

/**
 * A box-layout region of components that can vectorize itself onto any
 * drawing context, in its own local coordinates.
 */
export class VectorizationPanel implements CompositeRegion {
  readonly id: string;
  readonly padding: number;
  readonly axis: LayoutAxis;
  protected readonly metrics: TextMetrics;
  protected readonly components: Component[] = [];
  protected background: string = WHITE;
  protected foreground: string = BLACK;

  constructor(options: PanelOptions = {}) {
    this.id = options.id ?? "panel";
    this.padding = options.padding ?? DEFAULT_PADDING;
    this.axis = options.axis ?? "page";
    this.metrics = options.metrics ?? new EstimatedTextMetrics();
  }

  add(component: Component): this {
    component.setBackground(this.background);
    component.setForeground(this.foreground);
    this.components.push(component);
    return this;
  }

  getComponents(): readonly Component[] {
    return this.components;
  }

  // ---- Colors ----

  getBackground(): string {
    return this.background;
  }

  getForeground(): string {
    return this.foreground;
  }

  setBackground(color: string): void {
    this.background = color;
    for (const component of this.components) component.setBackground(color);
  }

  setForeground(color: string): void {
    this.foreground = color;
    for (const component of this.components) component.setForeground(color);
  }

  /** Apply a background and the foreground that reads against it. */
  setForegroundFromBackground(background: string): void {
    this.setBackground(background);
    this.setForeground(getForegroundFromBackground(background));
  }

  // ---- Geometry ----

  /** Size of the laid-out components plus the border. */
  getContentSize(): Size {
    const sizes = this.components.map((c) => c.measure(this.metrics));
    const inset = 2 * this.padding;

    if (this.axis === "page") {
      return {
        width: inset + Math.max(0, ...sizes.map((s) => s.width)),
        height: inset + sizes.reduce((sum, s) => sum + s.height, 0),
      };
    }
    return {
      width: inset + sizes.reduce((sum, s) => sum + s.width, 0),
      height: inset + Math.max(0, ...sizes.map((s) => s.height)),
    };
  }

  getPreferredSize(): Size {
    return this.getContentSize();
  }

  getWidth(): number {
    return this.getPreferredSize().width;
  }

  getHeight(): number {
    return this.getPreferredSize().height;
  }

  getBounds(): Bounds {
    const { width, height } = this.getPreferredSize();
    return { minX: 0, minY: 0, maxX: width, maxY: height };
  }

  // ---- Rendering ----

  vectorize(dc: DrawingContext): boolean {
    dc.openGroup({ class: "region", "data-region": this.id });
    this.paintContent(dc);
    dc.closeGroup();
    return true;
  }

  protected paintContent(dc: DrawingContext): void {
    const { width, height } = this.getContentSize();
    dc.rect(0, 0, width, height, { fill: this.background });

    let cursor = this.padding;
    for (const component of this.components) {
      const size = component.measure(this.metrics);
      if (this.axis === "page") {
        component.paint(dc, this.padding, cursor, this.metrics);
        cursor += size.height;
      } else {
        component.paint(dc, cursor, this.padding, this.metrics);
        cursor += size.width;
      }
    }
  }
}
