import { WHITE } from "../graphics/color.js";
import type { DrawingContext } from "../graphics/drawing-context.js";
import type { Size } from "../types/geometry.js";
import {
  TitledVectorizationPanel,
  type TitledPanelOptions,
} from "./titled-panel.js";
import type { CompositeRegion } from "./vector-source.js";

export interface CompositorOffsets {
  titlePaddingBottom: number;
  /** Extra vertical gap added every time the compositor moves to the next row */
  rowMargin: number;
}

export const DEFAULT_COMPOSITOR_OFFSETS: CompositorOffsets = {
  titlePaddingBottom: 8,
  rowMargin: 20,
};

export interface CompositePanelOptions extends TitledPanelOptions {
  rowMargin?: number;
}

// Paper-friendly background applied for the duration of an export
const EXPORT_BACKGROUND = WHITE;

/**
 * Composites several independently rendered regions into one drawing
 * context by moving the origin between them. Regions are given as rows:
 * regions in a row sit side by side, rows stack top to bottom.
 *
 * The offsets are layout configuration, not geometry derived from the
 * regions; the bounds reported to exporters use the same offsets, so the
 * composited page and the bounds always agree.
 */
export class CompositePanel extends TitledVectorizationPanel {
  readonly rowMargin: number;
  private readonly rows: CompositeRegion[][];

  constructor(rows: CompositeRegion[][], options: CompositePanelOptions = {}) {
    super({
      titlePaddingBottom: DEFAULT_COMPOSITOR_OFFSETS.titlePaddingBottom,
      ...options,
    });
    this.rows = rows;
    this.rowMargin = options.rowMargin ?? DEFAULT_COMPOSITOR_OFFSETS.rowMargin;
    for (const region of this.regions()) {
      region.setBackground(this.background);
      region.setForeground(this.foreground);
    }
  }

  getRows(): readonly (readonly CompositeRegion[])[] {
    return this.rows;
  }

  private regions(): CompositeRegion[] {
    return this.rows.flat();
  }

  override setBackground(color: string): void {
    super.setBackground(color);
    for (const region of this.regions()) region.setBackground(color);
  }

  override setForeground(color: string): void {
    super.setForeground(color);
    for (const region of this.regions()) region.setForeground(color);
  }

  // ---- Geometry ----

  private rowHeight(row: readonly CompositeRegion[]): number {
    return Math.max(0, ...row.map((region) => region.getHeight()));
  }

  /**
   * Vertical advance from the top of row `index` to the top of the next row.
   * The first row also carries the title adjustment.
   */
  rowAdvance(index: number): number {
    const row = this.rows[index] ?? [];
    const titleAdjustmentY = index === 0 ? this.getTitleAdjustmentY() : 0;
    return this.rowHeight(row) + titleAdjustmentY + this.rowMargin;
  }

  override getContentSize(): Size {
    let width = 0;
    let height = 0;
    this.rows.forEach((row, index) => {
      const rowWidth = row.reduce((sum, region) => sum + region.getWidth(), 0);
      width = Math.max(width, rowWidth);
      height +=
        index < this.rows.length - 1
          ? this.rowAdvance(index)
          : this.rowHeight(row);
    });
    return { width, height };
  }

  // ---- Rendering ----

  /**
   * Export the header and every region, row by row. A failed region stops
   * the remaining regions in its row and all later rows. The background in
   * effect before the export is restored on every path.
   */
  override vectorize(dc: DrawingContext): boolean {
    const background = this.background;
    this.setForegroundFromBackground(EXPORT_BACKGROUND);

    try {
      this.vectorizeHeader(dc);

      let exported = true;
      for (let index = 0; index < this.rows.length && exported; index++) {
        if (index > 0) {
          dc.translate(0, this.rowAdvance(index - 1));
        }
        exported = this.vectorizeRow(dc, this.rows[index]);
      }
      return exported;
    } finally {
      this.setForegroundFromBackground(background);
    }
  }

  /**
   * Regions in a row are shifted right by the widths already written, then
   * the shift is undone so that later rows left-align.
   */
  private vectorizeRow(
    dc: DrawingContext,
    row: readonly CompositeRegion[],
  ): boolean {
    let offsetX = 0;
    let exported = true;

    for (let i = 0; i < row.length; i++) {
      if (i > 0) {
        const advance = row[i - 1].getWidth();
        dc.translate(advance, 0);
        offsetX += advance;
      }
      exported = row[i].vectorize(dc);
      if (!exported) break;
    }

    if (offsetX !== 0) {
      dc.translate(-offsetX, 0);
    }
    return exported;
  }
}
