import {
  createPageTransform,
  formatNumber as n,
  type AffineTransform,
  type Bounds,
  type PageSize,
} from "@pagevector/core";
import { dscValue } from "./utils.js";

export interface EpsDocumentInfo {
  /** Passed through as-is; null omits the %%Title comment. */
  title: string | null;
  /** Null omits the %%Creator comment. */
  creator: string | null;
  page: PageSize;
  /** Source bounding box, mapped onto the full page. */
  bounds: Bounds;
  creationDate?: Date;
}

const PROLOG = [
  "/M { moveto } bind def",
  "/L { lineto } bind def",
  "/C { curveto } bind def",
  "/Z { closepath } bind def",
];

/**
 * Encapsulated PostScript document builder: DSC header, prolog, a single
 * page of content, and trailer.
 *
 * The source-to-page transform is applied here rather than by the caller,
 * because PostScript's page is Y-up: the content runs under a Y flip.
 */
export class EpsDocument {
  private content: string[] = [];

  constructor(private info: EpsDocumentInfo) {}

  /** The page transform applied around the content. */
  getPageTransform(): AffineTransform {
    return createPageTransform(this.info.bounds, this.info.page, "bottom-left");
  }

  addContent(ps: string): void {
    this.content.push(ps);
  }

  toString(): string {
    const { title, creator, page, creationDate } = this.info;
    const { a, b, c, d, e, f } = this.getPageTransform();
    const parts: string[] = [];

    parts.push("%!PS-Adobe-3.0 EPSF-3.0");
    parts.push(
      `%%BoundingBox: 0 0 ${Math.ceil(page.width)} ${Math.ceil(page.height)}`,
    );
    parts.push(`%%HiResBoundingBox: 0 0 ${n(page.width)} ${n(page.height)}`);
    if (title !== null) parts.push(`%%Title: ${dscValue(title)}`);
    if (creator !== null) parts.push(`%%Creator: ${dscValue(creator)}`);
    if (creationDate) {
      parts.push(`%%CreationDate: ${creationDate.toISOString()}`);
    }
    parts.push("%%LanguageLevel: 2");
    parts.push("%%Pages: 1");
    parts.push("%%EndComments");

    parts.push("%%BeginProlog");
    parts.push(...PROLOG);
    parts.push("%%EndProlog");

    parts.push("%%Page: 1 1");
    parts.push("gsave");
    parts.push(
      `[${n(a, 6)} ${n(b, 6)} ${n(c, 6)} ${n(d, 6)} ${n(e, 4)} ${n(f, 4)}] concat`,
    );
    for (const ps of this.content) {
      if (ps.length > 0) parts.push(ps);
    }
    parts.push("grestore");
    parts.push("showpage");
    parts.push("%%Trailer");
    parts.push("%%EOF");

    return parts.join("\n") + "\n";
  }
}
