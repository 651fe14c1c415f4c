import {
  defaultLogger,
  formatNumber as n,
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
import { psString } from "./utils.js";

export interface EpsDrawingContextOptions {
  outliner?: GlyphOutliner;
  logger?: Logger;
}

/**
 * PostScript implementation of DrawingContext.
 * Every primitive runs inside gsave/grestore so styles never leak;
 * translate/transform are left bare so they persist until the enclosing
 * group's grestore.
 */
export class EpsDrawingContext implements DrawingContext {
  private lines: string[] = [];
  private colorMode: ColorMode = "rgb";
  private textMode: TextRenderingMode = "text";
  private readonly outliner: GlyphOutliner | undefined;
  private readonly logger: Logger;
  private warnedNoOutliner = false;

  constructor(options: EpsDrawingContextOptions = {}) {
    this.outliner = options.outliner;
    this.logger = options.logger ?? defaultLogger;
  }

  rect(x: number, y: number, width: number, height: number, opts?: StyleOpts): void {
    const box = `${n(x)} ${n(y)} ${n(width)} ${n(height)}`;
    if (opts?.fill !== undefined) {
      this.lines.push("gsave", this.colorOp(opts.fill), `${box} rectfill`, "grestore");
    }
    if (opts?.stroke !== undefined) {
      this.stroked([`${box} rectstroke`], opts);
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

    this.lines.push("gsave");
    if (opts.fill !== undefined) this.lines.push(this.colorOp(opts.fill));
    this.lines.push(
      `/${standardFontName(opts.font)} findfont ${n(opts.font.size)} scalefont setfont`,
      `${n(x)} ${n(y)} moveto`,
      // The page runs Y-flipped; flip back so glyphs stand upright
      "1 -1 scale",
      `${psString(content)} show`,
      "grestore",
    );
  }

  polyline(points: Point[], opts?: StyleOpts): void {
    if (points.length < 2) return;
    const [first, ...rest] = points;
    const ops = [
      `newpath ${n(first.x)} ${n(first.y)} M`,
      ...rest.map((p) => `${n(p.x)} ${n(p.y)} L`),
      "stroke",
    ];
    this.stroked([ops.join(" ")], opts);
  }

  path(segments: PathSegment[], opts?: StyleOpts): void {
    if (segments.length === 0) return;
    this.lines.push("gsave");
    if (opts?.fill !== undefined) this.lines.push(this.colorOp(opts.fill));
    this.lines.push("newpath", ...pathOps(segments), "fill", "grestore");
  }

  translate(dx: number, dy: number): void {
    this.lines.push(`${n(dx)} ${n(dy)} translate`);
  }

  transform(matrix: AffineTransform): void {
    const { a, b, c, d, e, f } = matrix;
    this.lines.push(
      `[${n(a, 6)} ${n(b, 6)} ${n(c, 6)} ${n(d, 6)} ${n(e, 4)} ${n(f, 4)}] concat`,
    );
  }

  // Group attributes have no PostScript equivalent; only the state scope matters
  openGroup(): void {
    this.lines.push("gsave");
  }

  closeGroup(): void {
    this.lines.push("grestore");
  }

  setColorMode(mode: ColorMode): void {
    this.colorMode = mode;
  }

  setTextRenderingMode(mode: TextRenderingMode): void {
    this.textMode = mode;
  }

  getOutput(): string {
    return this.lines.join("\n");
  }

  private stroked(ops: string[], opts?: StyleOpts): void {
    this.lines.push("gsave");
    if (opts?.stroke !== undefined) this.lines.push(this.colorOp(opts.stroke));
    if (opts?.strokeWidth !== undefined) {
      this.lines.push(`${n(opts.strokeWidth)} setlinewidth`);
    }
    this.lines.push(...ops, "grestore");
  }

  private colorOp(color: string): string {
    const rgb = parseColor(color);
    if (this.colorMode === "cmyk") {
      const { c, m, y, k } = toCmyk(rgb);
      return `${n(c, 3)} ${n(m, 3)} ${n(y, 3)} ${n(k, 3)} setcmykcolor`;
    }
    return `${n(rgb.r, 3)} ${n(rgb.g, 3)} ${n(rgb.b, 3)} setrgbcolor`;
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

/**
 * PostScript path operators. PostScript has no quadratic curve, so
 * quadratics are raised to cubics from the current point.
 */
function pathOps(segments: PathSegment[]): string[] {
  const ops: string[] = [];
  let current: Point = { x: 0, y: 0 };
  let subpathStart: Point = { x: 0, y: 0 };

  for (const s of segments) {
    switch (s.type) {
      case "M":
        ops.push(`${n(s.x)} ${n(s.y)} M`);
        current = { x: s.x, y: s.y };
        subpathStart = current;
        break;
      case "L":
        ops.push(`${n(s.x)} ${n(s.y)} L`);
        current = { x: s.x, y: s.y };
        break;
      case "Q": {
        const c1x = current.x + (2 / 3) * (s.x1 - current.x);
        const c1y = current.y + (2 / 3) * (s.y1 - current.y);
        const c2x = s.x + (2 / 3) * (s.x1 - s.x);
        const c2y = s.y + (2 / 3) * (s.y1 - s.y);
        ops.push(
          `${n(c1x)} ${n(c1y)} ${n(c2x)} ${n(c2y)} ${n(s.x)} ${n(s.y)} C`,
        );
        current = { x: s.x, y: s.y };
        break;
      }
      case "C":
        ops.push(
          `${n(s.x1)} ${n(s.y1)} ${n(s.x2)} ${n(s.y2)} ${n(s.x)} ${n(s.y)} C`,
        );
        current = { x: s.x, y: s.y };
        break;
      case "Z":
        ops.push("Z");
        current = subpathStart;
        break;
    }
  }
  return ops;
}
