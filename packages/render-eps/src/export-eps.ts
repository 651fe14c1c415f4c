import {
  completeExport,
  encodeUtf8,
  resolveExportOptions,
  type ExportOptions,
  type ExportOutcome,
  type ExportSink,
  type VectorSource,
} from "@pagevector/core";
import { EpsDocument } from "./eps-document.js";
import { EpsDrawingContext } from "./eps-drawing-context.js";

export interface EpsExportOptions extends ExportOptions {
  /** Null omits the %%Creator comment. */
  creator?: string | null;
  creationDate?: Date;
}

export interface EpsExport {
  eps: string;
  /** False when the source reported a partial render */
  rendered: boolean;
}

/**
 * Replay the source onto a PostScript canvas and assemble the EPS file.
 */
export function createEpsDocument(
  source: VectorSource,
  options: EpsExportOptions = {},
): EpsExport {
  const opts = resolveExportOptions(options);

  const dc = new EpsDrawingContext({
    outliner: opts.outliner,
    logger: opts.logger,
  });
  dc.setColorMode(opts.colorMode);
  dc.setTextRenderingMode(opts.vectorizeText ? "vector" : "text");

  const rendered = source.vectorize(dc);

  const doc = new EpsDocument({
    title: opts.title,
    creator: options.creator ?? null,
    page: opts.page,
    bounds: source.getBounds(),
    creationDate: options.creationDate,
  });
  doc.addContent(dc.getOutput());

  return { eps: doc.toString(), rendered };
}

/**
 * Export the source as Encapsulated PostScript written to the sink.
 */
export function exportEps(
  sink: ExportSink,
  source: VectorSource,
  options: EpsExportOptions = {},
): Promise<ExportOutcome> {
  const { logger } = resolveExportOptions(options);
  return completeExport(
    "EPS",
    sink,
    () => {
      const { eps, rendered } = createEpsDocument(source, options);
      return { data: encodeUtf8(eps), rendered };
    },
    logger,
  );
}
