import { RenderError } from "../export/errors.js";

/**
 * Shortest decimal spelling of `value` rounded to `digits` places, for
 * document operands. SVG, PostScript and PDF have no spelling for NaN or
 * Infinity, so those throw instead of reaching the output.
 */
export function formatNumber(value: number, digits = 2): string {
  if (!Number.isFinite(value)) {
    throw new RenderError(`Cannot write non-finite number ${value}`);
  }
  return String(Number(value.toFixed(digits)));
}
