import * as fontkit from "fontkit";
import type { FontSpec, PathSegment } from "../types/geometry.js";
import type { GlyphOutliner } from "./text-metrics.js";

// Structural subset of fontkit's GlyphRun that the outline math needs.
export interface GlyphCommandLike {
  command: string;
  args: number[];
}

export interface GlyphRunLike {
  glyphs: { path: { commands: GlyphCommandLike[] } }[];
  positions: { xAdvance: number; xOffset: number; yOffset: number }[];
  advanceWidth: number;
}

/**
 * Convert a laid-out glyph run (font units, Y-up) into page path segments
 * (Y-down) with the baseline starting at (x, y).
 */
export function outlineGlyphRun(
  run: GlyphRunLike,
  x: number,
  y: number,
  scale: number,
): PathSegment[] {
  const segments: PathSegment[] = [];
  let penX = 0;

  run.glyphs.forEach((glyph, i) => {
    const pos = run.positions[i] ?? { xAdvance: 0, xOffset: 0, yOffset: 0 };
    const px = (gx: number): number => x + (penX + pos.xOffset + gx) * scale;
    const py = (gy: number): number => y - (pos.yOffset + gy) * scale;

    for (const { command, args } of glyph.path.commands) {
      switch (command) {
        case "moveTo":
          segments.push({ type: "M", x: px(args[0]), y: py(args[1]) });
          break;
        case "lineTo":
          segments.push({ type: "L", x: px(args[0]), y: py(args[1]) });
          break;
        case "quadraticCurveTo":
          segments.push({
            type: "Q",
            x1: px(args[0]),
            y1: py(args[1]),
            x: px(args[2]),
            y: py(args[3]),
          });
          break;
        case "bezierCurveTo":
          segments.push({
            type: "C",
            x1: px(args[0]),
            y1: py(args[1]),
            x2: px(args[2]),
            y2: py(args[3]),
            x: px(args[4]),
            y: py(args[5]),
          });
          break;
        case "closePath":
          segments.push({ type: "Z" });
          break;
        default:
          throw new Error(`Unsupported glyph path command: ${command}`);
      }
    }

    penX += pos.xAdvance;
  });

  return segments;
}

/**
 * Glyph outlines and advances from a TrueType/OpenType font file.
 * One face serves every FontSpec; only the size is honored.
 */
export class FontkitOutliner implements GlyphOutliner {
  private font: fontkit.Font;

  constructor(fontFile: string) {
    const opened = fontkit.openSync(fontFile);
    if ("fonts" in opened) {
      const first = opened.fonts[0];
      if (!first) {
        throw new Error(`Font collection has no faces: ${fontFile}`);
      }
      this.font = first;
    } else {
      this.font = opened;
    }
  }

  measureText(text: string, font: FontSpec): number {
    const run = this.font.layout(text);
    return run.advanceWidth * this.scaleFor(font);
  }

  outlineText(
    text: string,
    x: number,
    y: number,
    font: FontSpec,
  ): PathSegment[] {
    return outlineGlyphRun(this.font.layout(text), x, y, this.scaleFor(font));
  }

  private scaleFor(font: FontSpec): number {
    return font.size / this.font.unitsPerEm;
  }
}
