import {
  applySourceToDestinationTransform,
  completeExport,
  encodeUtf8,
  resolveExportOptions,
  type ExportOptions,
  type ExportOutcome,
  type ExportSink,
  type VectorSource,
} from "@pagevector/core";
import { SvgDocument } from "./svg-document.js";
import { SvgDrawingContext } from "./svg-drawing-context.js";

export const DEFAULT_SVG_TITLE = "The SVG Document";

export type SvgExportOptions = ExportOptions;

export interface SvgExport {
  svg: string;
  /** False when the source reported a partial render */
  rendered: boolean;
  width: number;
  height: number;
}

/** Empty or missing titles get a fixed placeholder. */
export function resolveSvgTitle(title: string | null | undefined): string {
  return title === null || title === undefined || title.length === 0
    ? DEFAULT_SVG_TITLE
    : title;
}

/**
 * Replay the source onto a fresh SVG canvas and assemble the document.
 * Nothing is written; see `exportSvg` for that.
 */
export function createSvgDocument(
  source: VectorSource,
  options?: SvgExportOptions,
): SvgExport {
  const opts = resolveExportOptions(options);

  // The canvas is sized in whole units; round up so nothing gets clipped
  // by the higher-precision page transform.
  const width = Math.ceil(opts.page.width);
  const height = Math.ceil(opts.page.height);

  const dc = new SvgDrawingContext({
    outliner: opts.outliner,
    logger: opts.logger,
  });
  dc.setColorMode(opts.colorMode);
  dc.setTextRenderingMode(opts.vectorizeText ? "vector" : "text");

  // SVG starts at the top left corner, like screen addressing.
  applySourceToDestinationTransform(dc, source.getBounds(), opts.page, "top-left");

  const rendered = source.vectorize(dc);

  const doc = new SvgDocument({ width, height }, resolveSvgTitle(opts.title));
  doc.addContent(dc.getOutput());

  return { svg: doc.toString(), rendered, width, height };
}

/**
 * Export the source as an SVG document written to the sink as UTF-8.
 */
export function exportSvg(
  sink: ExportSink,
  source: VectorSource,
  options?: SvgExportOptions,
): Promise<ExportOutcome> {
  const { logger } = resolveExportOptions(options);
  return completeExport(
    "SVG",
    sink,
    () => {
      const { svg, rendered } = createSvgDocument(source, options);
      return { data: encodeUtf8(svg), rendered };
    },
    logger,
  );
}
