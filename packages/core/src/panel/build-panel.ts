import { DEFAULT_FONT } from "../graphics/fonts.js";
import { DEFAULT_PAGE_SIZE, PAPER_SIZES } from "../graphics/paper.js";
import type { TextMetrics } from "../graphics/text-metrics.js";
import type {
  ComponentConfig,
  ExportConfig,
  FontConfig,
  LayoutConfig,
  RegionConfig,
} from "../types/config.js";
import type { FontSpec, PageSize } from "../types/geometry.js";
import { CheckBox, Label, type Component } from "./component.js";
import { CompositePanel } from "./composite-panel.js";
import { DEFAULT_TITLE_FONT } from "./titled-panel.js";
import { VectorizationPanel } from "./vectorization-panel.js";

export function resolveFont(
  config: FontConfig | undefined,
  fallback: FontSpec = DEFAULT_FONT,
): FontSpec {
  return {
    family: config?.family ?? fallback.family,
    style: config?.style ?? fallback.style,
    size: config?.size ?? fallback.size,
  };
}

function buildComponent(config: ComponentConfig): Component {
  switch (config.type) {
    case "label":
      return new Label(config.text, resolveFont(config.font));
    case "checkbox":
      return new CheckBox(
        config.text,
        config.selected ?? false,
        resolveFont(config.font),
      );
  }
}

function buildRegion(
  config: RegionConfig,
  metrics: TextMetrics | undefined,
): VectorizationPanel {
  const panel = new VectorizationPanel({
    id: config.id,
    padding: config.padding,
    axis: config.axis,
    metrics,
  });
  for (const component of config.components) {
    panel.add(buildComponent(component));
  }
  return panel;
}

/**
 * Build the composited panel tree described by a layout config.
 * Every region shares the given metrics so layout matches the output.
 */
export function buildCompositePanel(
  config: LayoutConfig,
  metrics?: TextMetrics,
): CompositePanel {
  const rows = config.rows.map((row) =>
    row.map((region) => buildRegion(region, metrics)),
  );
  const panel = new CompositePanel(rows, {
    id: "composite",
    title: config.title ?? null,
    titleFont: resolveFont(config.titleFont, DEFAULT_TITLE_FONT),
    titlePaddingBottom: config.compositor?.titlePaddingBottom,
    rowMargin: config.compositor?.rowMargin,
    metrics,
  });
  if (config.background !== undefined) {
    panel.setForegroundFromBackground(config.background);
  }
  return panel;
}

/**
 * Page size from an export block: explicit dimensions win over a named
 * paper, which wins over North American Letter.
 */
export function resolvePageSize(config: ExportConfig | undefined): PageSize {
  const paper = config?.paper ? PAPER_SIZES[config.paper] : DEFAULT_PAGE_SIZE;
  return {
    width: config?.pageWidth ?? paper.width,
    height: config?.pageHeight ?? paper.height,
  };
}
