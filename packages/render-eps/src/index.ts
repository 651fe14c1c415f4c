export {
  createEpsDocument,
  exportEps,
  type EpsExport,
  type EpsExportOptions,
} from "./export-eps.js";
export { EpsDocument, type EpsDocumentInfo } from "./eps-document.js";
export {
  EpsDrawingContext,
  type EpsDrawingContextOptions,
} from "./eps-drawing-context.js";
export { psString } from "./utils.js";
