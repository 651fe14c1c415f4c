import type { DrawingContext } from "../graphics/drawing-context.js";
import { baselineOffset, lineHeight } from "../graphics/fonts.js";
import type { FontSpec, Size } from "../types/geometry.js";
import { VectorizationPanel, type PanelOptions } from "./vectorization-panel.js";

export interface TitledPanelOptions extends PanelOptions {
  title?: string | null;
  titleFont?: FontSpec;
  /** Space between the title line and the content below it */
  titlePaddingBottom?: number;
}

export const DEFAULT_TITLE_FONT: FontSpec = {
  family: "sans-serif",
  style: "bold",
  size: 14,
};

export const DEFAULT_TITLE_PADDING_BOTTOM = 8;

/**
 * A panel with a title header above its content. The header shifts the
 * content down by the title adjustment when vectorized.
 */
export class TitledVectorizationPanel extends VectorizationPanel {
  protected title: string | null;
  readonly titleFont: FontSpec;
  readonly titlePaddingBottom: number;

  constructor(options: TitledPanelOptions = {}) {
    super(options);
    this.title = options.title ?? null;
    this.titleFont = options.titleFont ?? DEFAULT_TITLE_FONT;
    this.titlePaddingBottom =
      options.titlePaddingBottom ?? DEFAULT_TITLE_PADDING_BOTTOM;
  }

  getTitle(): string | null {
    return this.title;
  }

  setTitle(title: string | null): void {
    this.title = title;
  }

  /** The title to draw, or null when there is none or it is empty. */
  private visibleTitle(): string | null {
    return this.title !== null && this.title.length > 0 ? this.title : null;
  }

  /** Height of the title line; zero without a title. */
  getTitleOffsetY(): number {
    return this.visibleTitle() !== null ? lineHeight(this.titleFont.size) : 0;
  }

  /**
   * Title height plus its bottom padding. The padding applies with or
   * without a title, so an untitled panel still starts its content below it.
   */
  getTitleAdjustmentY(): number {
    return this.getTitleOffsetY() + this.titlePaddingBottom;
  }

  override getPreferredSize(): Size {
    const content = this.getContentSize();
    const title = this.visibleTitle();
    const titleWidth =
      title !== null
        ? Math.ceil(this.metrics.measureText(title, this.titleFont))
        : 0;
    return {
      width: Math.max(content.width, titleWidth),
      height: content.height + this.getTitleAdjustmentY(),
    };
  }

  override vectorize(dc: DrawingContext): boolean {
    dc.openGroup({ class: "titled-panel" });
    this.vectorizeHeader(dc);
    this.paintContent(dc);
    dc.closeGroup();
    return true;
  }

  /**
   * Paint the page background and title, then move the origin below the
   * header. The translation is left in place for the content that follows.
   */
  protected vectorizeHeader(dc: DrawingContext): void {
    const { width, height } = this.getPreferredSize();
    dc.rect(0, 0, width, height, { fill: this.background });

    const title = this.visibleTitle();
    if (title !== null) {
      dc.text(0, baselineOffset(this.titleFont.size), title, {
        font: this.titleFont,
        fill: this.foreground,
      });
    }

    const adjustment = this.getTitleAdjustmentY();
    if (adjustment > 0) {
      dc.translate(0, adjustment);
    }
  }
}
