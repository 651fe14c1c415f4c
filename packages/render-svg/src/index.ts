export {
  DEFAULT_SVG_TITLE,
  createSvgDocument,
  exportSvg,
  resolveSvgTitle,
  type SvgExport,
  type SvgExportOptions,
} from "./export-svg.js";
export { SvgDocument } from "./svg-document.js";
export {
  SvgDrawingContext,
  type SvgDrawingContextOptions,
} from "./svg-drawing-context.js";
