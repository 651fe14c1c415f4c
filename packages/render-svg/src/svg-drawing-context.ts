import {
  defaultLogger,
  formatNumber as n,
  isBold,
  isItalic,
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
import { attrList, escapeText } from "./xml.js";

export interface SvgDrawingContextOptions {
  outliner?: GlyphOutliner;
  logger?: Logger;
}

// Generic CSS families for the three FontSpec families
const SVG_FONT_FAMILY = {
  "sans-serif": "'Helvetica','Arial',sans-serif",
  serif: "'Times New Roman','Times',serif",
  monospace: "'Courier New','Courier',monospace",
} as const;

/**
 * SVG implementation of DrawingContext.
 * Builds SVG elements as string output. Transforms open nested <g>
 * elements; closing a group also closes the transforms opened inside it.
 */
export class SvgDrawingContext implements DrawingContext {
  private parts: string[] = [];
  // Open transform groups per open group; index 0 is the root
  private transformDepths: number[] = [0];
  private textMode: TextRenderingMode = "text";
  private readonly outliner: GlyphOutliner | undefined;
  private readonly logger: Logger;
  private warnedNoOutliner = false;
  private warnedCmyk = false;

  constructor(options: SvgDrawingContextOptions = {}) {
    this.outliner = options.outliner;
    this.logger = options.logger ?? defaultLogger;
  }

  rect(x: number, y: number, width: number, height: number, opts?: StyleOpts): void {
    this.parts.push(
      `<rect x="${n(x)}" y="${n(y)}" width="${n(width)}" height="${n(height)}"${styleAttrs(opts)}/>`,
    );
  }

  text(x: number, y: number, content: string, opts: TextOpts): void {
    const outliner = this.vectorOutliner();
    if (outliner) {
      this.path(outliner.outlineText(content, x, y, opts.font), {
        fill: opts.fill,
      });
      return;
    }
    this.parts.push(
      `<text x="${n(x)}" y="${n(y)}"${textAttrs(opts)}>${escapeText(content)}</text>`,
    );
  }

  polyline(points: Point[], opts?: StyleOpts): void {
    const pointsStr = points.map((p) => `${n(p.x)},${n(p.y)}`).join(" ");
    // Unfilled unless asked; SVG would otherwise fill the open shape black
    const style = styleAttrs({ fill: "none", ...opts });
    this.parts.push(`<polyline points="${pointsStr}"${style}/>`);
  }

  path(segments: PathSegment[], opts?: StyleOpts): void {
    if (segments.length === 0) return;
    this.parts.push(`<path d="${pathData(segments)}"${styleAttrs(opts)}/>`);
  }

  translate(dx: number, dy: number): void {
    this.openTransform(`translate(${n(dx)} ${n(dy)})`);
  }

  transform(matrix: AffineTransform): void {
    const { a, b, c, d, e, f } = matrix;
    this.openTransform(
      `matrix(${n(a, 6)} ${n(b, 6)} ${n(c, 6)} ${n(d, 6)} ${n(e, 4)} ${n(f, 4)})`,
    );
  }

  openGroup(attrs: Record<string, string> = {}): void {
    this.parts.push(`<g${attrList(attrs)}>`);
    this.transformDepths.push(0);
  }

  closeGroup(): void {
    if (this.transformDepths.length <= 1) {
      throw new Error("closeGroup() called without a matching openGroup()");
    }
    const depth = this.transformDepths.pop() ?? 0;
    for (let i = 0; i < depth; i++) this.parts.push("</g>");
    this.parts.push("</g>");
  }

  setColorMode(mode: ColorMode): void {
    if (mode === "cmyk" && !this.warnedCmyk) {
      this.warnedCmyk = true;
      this.logger.info("SVG output is RGB only; ignoring CMYK color mode");
    }
  }

  setTextRenderingMode(mode: TextRenderingMode): void {
    this.textMode = mode;
  }

  /** Content so far, with every still-open group closed. */
  getOutput(): string {
    const open = this.transformDepths.reduce(
      (sum, depth) => sum + depth + 1,
      -1,
    );
    return [...this.parts, ...Array<string>(open).fill("</g>")].join("\n");
  }

  private openTransform(value: string): void {
    this.parts.push(`<g transform="${value}">`);
    this.transformDepths[this.transformDepths.length - 1] += 1;
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

function pathData(segments: PathSegment[]): string {
  return segments
    .map((s) => {
      switch (s.type) {
        case "M":
        case "L":
          return `${s.type}${n(s.x)} ${n(s.y)}`;
        case "Q":
          return `Q${n(s.x1)} ${n(s.y1)} ${n(s.x)} ${n(s.y)}`;
        case "C":
          return `C${n(s.x1)} ${n(s.y1)} ${n(s.x2)} ${n(s.y2)} ${n(s.x)} ${n(s.y)}`;
        case "Z":
          return "Z";
      }
    })
    .join(" ");
}

function styleAttrs(opts?: StyleOpts): string {
  if (!opts) return "";
  const attrs: string[] = [];
  if (opts.stroke !== undefined) attrs.push(`stroke="${opts.stroke}"`);
  if (opts.strokeWidth !== undefined) attrs.push(`stroke-width="${n(opts.strokeWidth)}"`);
  if (opts.fill !== undefined) attrs.push(`fill="${opts.fill}"`);
  return attrs.length > 0 ? " " + attrs.join(" ") : "";
}

function textAttrs(opts: TextOpts): string {
  const { font } = opts;
  const attrs: string[] = [
    `font-family="${SVG_FONT_FAMILY[font.family]}"`,
    `font-size="${n(font.size)}"`,
  ];
  if (isBold(font)) attrs.push(`font-weight="bold"`);
  if (isItalic(font)) attrs.push(`font-style="italic"`);
  if (opts.fill !== undefined) attrs.push(`fill="${opts.fill}"`);
  return " " + attrs.join(" ");
}
