import { describe, expect, it } from "vitest";
import { outlineGlyphRun, type GlyphRunLike } from "../src/index.js";

const run: GlyphRunLike = {
  glyphs: [
    {
      path: {
        commands: [
          { command: "moveTo", args: [0, 0] },
          { command: "lineTo", args: [100, 0] },
          { command: "lineTo", args: [100, 200] },
          { command: "closePath", args: [] },
        ],
      },
    },
    {
      path: {
        commands: [
          { command: "moveTo", args: [0, 0] },
          { command: "quadraticCurveTo", args: [50, 100, 100, 0] },
        ],
      },
    },
  ],
  positions: [
    { xAdvance: 500, xOffset: 0, yOffset: 0 },
    { xAdvance: 400, xOffset: 10, yOffset: 0 },
  ],
  advanceWidth: 900,
};

describe("outlineGlyphRun", () => {
  it("scales font units and flips Y about the baseline", () => {
    const segments = outlineGlyphRun(run, 5, 50, 0.01);
    expect(segments.slice(0, 4)).toEqual([
      { type: "M", x: 5, y: 50 },
      { type: "L", x: 6, y: 50 },
      { type: "L", x: 6, y: 48 },
      { type: "Z" },
    ]);
  });

  it("advances the pen between glyphs", () => {
    const segments = outlineGlyphRun(run, 5, 50, 0.01);
    expect(segments[4]).toEqual({ type: "M", x: expect.closeTo(10.1, 6), y: 50 });
    expect(segments[5]).toEqual({
      type: "Q",
      x1: expect.closeTo(10.6, 6),
      y1: expect.closeTo(49, 6),
      x: expect.closeTo(11.1, 6),
      y: 50,
    });
  });

  it("rejects commands it cannot map", () => {
    const odd: GlyphRunLike = {
      glyphs: [{ path: { commands: [{ command: "arc", args: [] }] } }],
      positions: [{ xAdvance: 0, xOffset: 0, yOffset: 0 }],
      advanceWidth: 0,
    };
    expect(() => outlineGlyphRun(odd, 0, 0, 1)).toThrow(
      "Unsupported glyph path command: arc",
    );
  });
});
