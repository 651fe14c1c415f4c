export {
  createPdfDocument,
  exportPdf,
  type PdfExport,
  type PdfExportOptions,
} from "./export-pdf.js";
export {
  PdfDrawingContext,
  type PdfDrawingContextOptions,
} from "./pdf-drawing-context.js";
