import {
  defaultLogger,
  parseColor,
  standardFontName,
  toCmyk,
  type AffineTransform,
  type ColorMode,
  type DrawingContext,
  type GlyphOutliner,
  type Logger,
  type PathSegment,
  type Point,
  type StyleOpts,
  type TextOpts,
  type TextRenderingMode,
} from "@pagevector/core";

type PdfColor = [number, number, number] | [number, number, number, number];

export interface PdfDrawingContextOptions {
  outliner?: GlyphOutliner;
  logger?: Logger;
}

/**
 * DrawingContext over a pdfkit document. Groups map to save/restore of
 * the graphics state, which also restores the transform.
 */
export class PdfDrawingContext implements DrawingContext {
  private colorMode: ColorMode = "rgb";
  private textMode: TextRenderingMode = "text";
  private readonly outliner: GlyphOutliner | undefined;
  private readonly logger: Logger;
  private warnedNoOutliner = false;

  constructor(
    private doc: PDFKit.PDFDocument,
    options: PdfDrawingContextOptions = {},
  ) {
    this.outliner = options.outliner;
    this.logger = options.logger ?? defaultLogger;
  }

  rect(x: number, y: number, width: number, height: number, opts?: StyleOpts): void {
    if (opts?.fill !== undefined) {
      this.doc.save();
      this.doc.fillColor(this.color(opts.fill));
      this.doc.rect(x, y, width, height).fill();
      this.doc.restore();
    }
    if (opts?.stroke !== undefined) {
      this.doc.save();
      this.applyStroke(opts);
      this.doc.rect(x, y, width, height).stroke();
      this.doc.restore();
    }
  }

  text(x: number, y: number, content: string, opts: TextOpts): void {
    const outliner = this.vectorOutliner();
    if (outliner) {
      this.path(outliner.outlineText(content, x, y, opts.font), {
        fill: opts.fill,
      });
      return;
    }

    this.doc.save();
    if (opts.fill !== undefined) this.doc.fillColor(this.color(opts.fill));
    this.doc
      .font(standardFontName(opts.font))
      .fontSize(opts.font.size)
      .text(content, x, y, { lineBreak: false, baseline: "alphabetic" });
    this.doc.restore();
  }

  polyline(points: Point[], opts?: StyleOpts): void {
    if (points.length < 2) return;
    const [first, ...rest] = points;
    this.doc.save();
    this.applyStroke(opts);
    this.doc.moveTo(first.x, first.y);
    for (const p of rest) this.doc.lineTo(p.x, p.y);
    this.doc.stroke();
    this.doc.restore();
  }

  path(segments: PathSegment[], opts?: StyleOpts): void {
    if (segments.length === 0) return;
    this.doc.save();
    if (opts?.fill !== undefined) this.doc.fillColor(this.color(opts.fill));
    for (const s of segments) {
      switch (s.type) {
        case "M":
          this.doc.moveTo(s.x, s.y);
          break;
        case "L":
          this.doc.lineTo(s.x, s.y);
          break;
        case "Q":
          this.doc.quadraticCurveTo(s.x1, s.y1, s.x, s.y);
          break;
        case "C":
          this.doc.bezierCurveTo(s.x1, s.y1, s.x2, s.y2, s.x, s.y);
          break;
        case "Z":
          this.doc.closePath();
          break;
      }
    }
    this.doc.fill();
    this.doc.restore();
  }

  translate(dx: number, dy: number): void {
    this.doc.translate(dx, dy);
  }

  transform(matrix: AffineTransform): void {
    const { a, b, c, d, e, f } = matrix;
    this.doc.transform(a, b, c, d, e, f);
  }

  openGroup(): void {
    this.doc.save();
  }

  closeGroup(): void {
    this.doc.restore();
  }

  setColorMode(mode: ColorMode): void {
    this.colorMode = mode;
  }

  setTextRenderingMode(mode: TextRenderingMode): void {
    this.textMode = mode;
  }

  private applyStroke(opts?: StyleOpts): void {
    if (opts?.stroke !== undefined) this.doc.strokeColor(this.color(opts.stroke));
    if (opts?.strokeWidth !== undefined) this.doc.lineWidth(opts.strokeWidth);
  }

  /** pdfkit takes RGB as 0-255 triples and CMYK as 0-100 quads. */
  private color(value: string): PdfColor {
    const rgb = parseColor(value);
    if (this.colorMode === "cmyk") {
      const { c, m, y, k } = toCmyk(rgb);
      return [c * 100, m * 100, y * 100, k * 100];
    }
    return [rgb.r * 255, rgb.g * 255, rgb.b * 255];
  }

  private vectorOutliner(): GlyphOutliner | undefined {
    if (this.textMode !== "vector") return undefined;
    if (!this.outliner && !this.warnedNoOutliner) {
      this.warnedNoOutliner = true;
      this.logger.warn(
        "Vectorized text requested but no glyph outliner configured; writing native text",
      );
    }
    return this.outliner;
  }
}
