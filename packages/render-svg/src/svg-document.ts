import { formatNumber as n } from "@pagevector/core";
import { escapeText } from "./xml.js";

/**
 * Lightweight SVG document builder. No DOM dependency.
 * The canvas is sized in whole units; callers round up beforehand.
 */
export class SvgDocument {
  private content: string[] = [];

  constructor(
    private size: { width: number; height: number },
    private title: string,
  ) {}

  addContent(svg: string): void {
    this.content.push(svg);
  }

  toString(): string {
    const { width, height } = this.size;
    const parts: string[] = [];

    parts.push(`<?xml version="1.0" encoding="UTF-8"?>`);
    parts.push(
      `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${n(width)} ${n(height)}" width="${n(width)}" height="${n(height)}">`,
    );
    parts.push(`<title>${escapeText(this.title)}</title>`);

    for (const el of this.content) {
      parts.push(el);
    }

    parts.push("</svg>");
    return parts.join("\n");
  }
}
