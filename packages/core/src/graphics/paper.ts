import type { PageSize } from "../types/geometry.js";

// Units are points (1/72 inch).
export const NA_LETTER_WIDTH_POINTS = 612;
export const NA_LETTER_HEIGHT_POINTS = 792;

export type PaperName = "letter" | "legal" | "tabloid" | "a4" | "a3";

export const PAPER_SIZES: Record<PaperName, PageSize> = {
  letter: { width: NA_LETTER_WIDTH_POINTS, height: NA_LETTER_HEIGHT_POINTS },
  legal: { width: 612, height: 1008 },
  tabloid: { width: 792, height: 1224 },
  a4: { width: 595.28, height: 841.89 },
  a3: { width: 841.89, height: 1190.55 },
};

export const DEFAULT_PAGE_SIZE: PageSize = PAPER_SIZES.letter;

export function isPaperName(name: string): name is PaperName {
  return Object.prototype.hasOwnProperty.call(PAPER_SIZES, name);
}
