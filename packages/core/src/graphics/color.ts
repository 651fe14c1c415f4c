export const WHITE = "#ffffff";
export const BLACK = "#000000";

/** RGB components in the range 0..1. */
export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/** CMYK components in the range 0..1. */
export interface CmykColor {
  c: number;
  m: number;
  y: number;
  k: number;
}

const HEX_COLOR = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i;

export function isHexColor(value: string): boolean {
  return HEX_COLOR.test(value);
}

/**
 * Parse a `#rgb` or `#rrggbb` color.
 * Throws on anything else.
 */
export function parseColor(value: string): RgbColor {
  const match = HEX_COLOR.exec(value);
  if (!match) {
    throw new Error(`Invalid color "${value}": expected #rgb or #rrggbb`);
  }
  let hex = match[1];
  if (hex.length === 3) {
    hex = hex
      .split("")
      .map((ch) => ch + ch)
      .join("");
  }
  return {
    r: parseInt(hex.slice(0, 2), 16) / 255,
    g: parseInt(hex.slice(2, 4), 16) / 255,
    b: parseInt(hex.slice(4, 6), 16) / 255,
  };
}

/**
 * Naive device conversion (no ICC profile). Pure black is K only.
 */
export function toCmyk(rgb: RgbColor): CmykColor {
  const k = 1 - Math.max(rgb.r, rgb.g, rgb.b);
  if (k >= 1) {
    return { c: 0, m: 0, y: 0, k: 1 };
  }
  return {
    c: (1 - rgb.r - k) / (1 - k),
    m: (1 - rgb.g - k) / (1 - k),
    y: (1 - rgb.b - k) / (1 - k),
    k,
  };
}

/**
 * Pick black or white, whichever reads against the given background.
 */
export function getForegroundFromBackground(background: string): string {
  const { r, g, b } = parseColor(background);
  const luma = 0.299 * r + 0.587 * g + 0.114 * b;
  return luma > 0.5 ? BLACK : WHITE;
}
