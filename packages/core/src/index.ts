export * from "./types/config.js";
export * from "./types/geometry.js";
export {
  LayoutError,
  layoutSyntaxOf,
  parseLayout,
  type LayoutSyntax,
  type ParseLayoutOptions,
} from "./parser/layout-parser.js";

export * from "./graphics/color.js";
export type {
  DrawingContext,
  StyleOpts,
  TextOpts,
} from "./graphics/drawing-context.js";
export * from "./graphics/fonts.js";
export { formatNumber } from "./graphics/format-number.js";
export {
  FontkitOutliner,
  outlineGlyphRun,
  type GlyphRunLike,
} from "./graphics/fontkit-outliner.js";
export * from "./graphics/page-transform.js";
export * from "./graphics/paper.js";
export * from "./graphics/text-metrics.js";

export * from "./panel/vector-source.js";
export { Component, Label, CheckBox } from "./panel/component.js";
export * from "./panel/vectorization-panel.js";
export * from "./panel/titled-panel.js";
export * from "./panel/composite-panel.js";
export {
  buildCompositePanel,
  resolveFont,
  resolvePageSize,
} from "./panel/build-panel.js";

export * from "./export/errors.js";
export { encodeUtf8 } from "./export/encoding.js";
export { defaultLogger, type Logger } from "./export/logger.js";
export * from "./export/outcome.js";
export { writeToSink, type ExportSink } from "./export/sink.js";
