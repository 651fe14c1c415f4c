import PDFDocument from "pdfkit";
import {
  applySourceToDestinationTransform,
  completeExport,
  resolveExportOptions,
  type ExportOptions,
  type ExportOutcome,
  type ExportSink,
  type VectorSource,
} from "@pagevector/core";
import { PdfDrawingContext } from "./pdf-drawing-context.js";

export interface PdfExportOptions extends ExportOptions {
  /** Null omits the Author info entry. */
  author?: string | null;
  /** Deflate content streams; on by default. */
  compress?: boolean;
}

export interface PdfExport {
  pdf: Buffer;
  /** False when the source reported a partial render */
  rendered: boolean;
}

function collect(doc: PDFKit.PDFDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);
  });
}

/**
 * Replay the source onto a single pdfkit page and collect the file bytes.
 */
export async function createPdfDocument(
  source: VectorSource,
  options: PdfExportOptions = {},
): Promise<PdfExport> {
  const opts = resolveExportOptions(options);

  const doc = new PDFDocument({
    size: [opts.page.width, opts.page.height],
    margin: 0,
    compress: options.compress ?? true,
  });
  if (opts.title !== null) doc.info.Title = opts.title;
  if (options.author !== undefined && options.author !== null) {
    doc.info.Author = options.author;
  }
  const bytes = collect(doc);

  const dc = new PdfDrawingContext(doc, {
    outliner: opts.outliner,
    logger: opts.logger,
  });
  dc.setColorMode(opts.colorMode);
  dc.setTextRenderingMode(opts.vectorizeText ? "vector" : "text");

  // pdfkit's user space is already top-left, like SVG.
  applySourceToDestinationTransform(dc, source.getBounds(), opts.page, "top-left");

  let rendered: boolean;
  try {
    rendered = source.vectorize(dc);
  } finally {
    // End the stream either way so the collector settles.
    doc.end();
  }

  return { pdf: await bytes, rendered };
}

/**
 * Export the source as a single-page PDF written to the sink.
 */
export function exportPdf(
  sink: ExportSink,
  source: VectorSource,
  options: PdfExportOptions = {},
): Promise<ExportOutcome> {
  const { logger } = resolveExportOptions(options);
  return completeExport(
    "PDF",
    sink,
    async () => {
      const { pdf, rendered } = await createPdfDocument(source, options);
      return { data: pdf, rendered };
    },
    logger,
  );
}
