import { BLACK, WHITE } from "../graphics/color.js";
import type { DrawingContext } from "../graphics/drawing-context.js";
import { DEFAULT_FONT, baselineOffset, lineHeight } from "../graphics/fonts.js";
import type { TextMetrics } from "../graphics/text-metrics.js";
import type { FontSpec, Size } from "../types/geometry.js";

/**
 * A leaf visual element laid out by a panel.
 * `paint` draws with (x, y) as the top-left of the measured box.
 */
export abstract class Component {
  protected background: string = WHITE;
  protected foreground: string = BLACK;

  setBackground(color: string): void {
    this.background = color;
  }

  setForeground(color: string): void {
    this.foreground = color;
  }

  getBackground(): string {
    return this.background;
  }

  getForeground(): string {
    return this.foreground;
  }

  abstract measure(metrics: TextMetrics): Size;

  abstract paint(
    dc: DrawingContext,
    x: number,
    y: number,
    metrics: TextMetrics,
  ): void;
}

export class Label extends Component {
  constructor(
    readonly text: string,
    readonly font: FontSpec = DEFAULT_FONT,
  ) {
    super();
  }

  measure(metrics: TextMetrics): Size {
    return {
      width: Math.ceil(metrics.measureText(this.text, this.font)),
      height: lineHeight(this.font.size),
    };
  }

  paint(dc: DrawingContext, x: number, y: number): void {
    dc.text(x, y + baselineOffset(this.font.size), this.text, {
      font: this.font,
      fill: this.foreground,
    });
  }
}

const BOX_SIZE = 13;
const BOX_GAP = 4;

export class CheckBox extends Component {
  constructor(
    readonly text: string,
    readonly selected: boolean = false,
    readonly font: FontSpec = DEFAULT_FONT,
  ) {
    super();
  }

  measure(metrics: TextMetrics): Size {
    return {
      width:
        BOX_SIZE +
        BOX_GAP +
        Math.ceil(metrics.measureText(this.text, this.font)),
      height: Math.max(BOX_SIZE, lineHeight(this.font.size)),
    };
  }

  paint(
    dc: DrawingContext,
    x: number,
    y: number,
    metrics: TextMetrics,
  ): void {
    const { height } = this.measure(metrics);
    const boxY = y + (height - BOX_SIZE) / 2;

    dc.rect(x, boxY, BOX_SIZE, BOX_SIZE, {
      fill: this.background,
      stroke: this.foreground,
      strokeWidth: 1,
    });

    if (this.selected) {
      dc.polyline(
        [
          { x: x + 3, y: boxY + 7 },
          { x: x + 5.5, y: boxY + 10 },
          { x: x + 10, y: boxY + 3 },
        ],
        { stroke: this.foreground, strokeWidth: 1.5 },
      );
    }

    const textTop = y + (height - lineHeight(this.font.size)) / 2;
    dc.text(
      x + BOX_SIZE + BOX_GAP,
      textTop + baselineOffset(this.font.size),
      this.text,
      { font: this.font, fill: this.foreground },
    );
  }
}
