import { readFileSync } from "node:fs";
import {
  EstimatedTextMetrics,
  FontkitOutliner,
  buildCompositePanel,
  isPaperName,
  parseLayout,
  resolvePageSize,
  type ColorMode,
  type ExportConfig,
  type ExportOutcome,
  type GlyphOutliner,
  type LayoutConfig,
  type PageSize,
  type VectorSource,
} from "@pagevector/core";
import { exportEps } from "@pagevector/render-eps";
import { exportPdf } from "@pagevector/render-pdf";
import { exportSvg } from "@pagevector/render-svg";

export type OutputFormat = "eps" | "svg" | "pdf";

export const DEFAULT_CREATOR = "Saved from pagevector";

export interface ExportCommandOptions {
  format?: string;
  output?: string;
  title?: string;
  creator?: string;
  author?: string;
  paper?: string;
  pageWidth?: string;
  pageHeight?: string;
  colorMode?: string;
  vectorizeText?: boolean;
  font?: string;
}

export interface ExportSettings {
  format: OutputFormat;
  output: string;
  title: string | null;
  creator: string;
  author: string;
  page: PageSize;
  colorMode: ColorMode;
  vectorizeText: boolean;
  fontFile: string | undefined;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === "eps" || value === "svg" || value === "pdf";
}

/**
 * An explicit --format wins; otherwise the output extension decides,
 * falling back to SVG.
 */
export function resolveFormat(
  format: string | undefined,
  output: string | undefined,
): OutputFormat {
  if (format !== undefined) {
    const lower = format.toLowerCase();
    if (!isOutputFormat(lower)) {
      throw new Error(`Unknown format: ${format} (expected eps, svg or pdf)`);
    }
    return lower;
  }
  const ext = output?.match(/\.([a-z]+)$/i)?.[1]?.toLowerCase();
  return ext !== undefined && isOutputFormat(ext) ? ext : "svg";
}

function parsePoints(value: string, flag: string): number {
  const points = Number(value);
  if (!Number.isFinite(points) || points <= 0) {
    throw new Error(`${flag} must be a positive number of points, got "${value}"`);
  }
  return points;
}

/**
 * Merge command-line options over the layout's export block.
 */
export function resolveExportSettings(
  input: string,
  config: LayoutConfig,
  options: ExportCommandOptions,
): ExportSettings {
  const format = resolveFormat(options.format, options.output);
  const fromLayout = config.export;

  let paper = fromLayout?.paper;
  if (options.paper !== undefined) {
    if (!isPaperName(options.paper)) {
      throw new Error(`Unknown paper size: ${options.paper}`);
    }
    paper = options.paper;
  }
  // A named paper on the command line replaces the layout's explicit size
  const layoutSize: ExportConfig | undefined =
    options.paper !== undefined ? undefined : fromLayout;
  const page = resolvePageSize({
    paper,
    pageWidth:
      options.pageWidth !== undefined
        ? parsePoints(options.pageWidth, "--page-width")
        : layoutSize?.pageWidth,
    pageHeight:
      options.pageHeight !== undefined
        ? parsePoints(options.pageHeight, "--page-height")
        : layoutSize?.pageHeight,
  });

  let colorMode: ColorMode = fromLayout?.colorMode ?? "rgb";
  if (options.colorMode !== undefined) {
    if (options.colorMode !== "rgb" && options.colorMode !== "cmyk") {
      throw new Error(`Unknown color mode: ${options.colorMode}`);
    }
    colorMode = options.colorMode;
  }

  // commander sets vectorizeText to true unless --no-vectorize-text is given
  const vectorizeText =
    options.vectorizeText === false ? false : (fromLayout?.vectorizeText ?? true);

  return {
    format,
    output: options.output ?? input.replace(/\.(ya?ml|json)$/i, "") + `.${format}`,
    title: options.title ?? config.title ?? null,
    creator: options.creator ?? fromLayout?.creator ?? DEFAULT_CREATOR,
    author: options.author ?? fromLayout?.author ?? DEFAULT_CREATOR,
    page,
    colorMode,
    vectorizeText,
    fontFile: options.font ?? fromLayout?.fontFile,
  };
}

function runExport(
  settings: ExportSettings,
  source: VectorSource,
  outliner: GlyphOutliner | undefined,
): Promise<ExportOutcome> {
  const common = {
    title: settings.title,
    pageWidth: settings.page.width,
    pageHeight: settings.page.height,
    colorMode: settings.colorMode,
    vectorizeText: settings.vectorizeText,
    outliner,
  };
  switch (settings.format) {
    case "eps":
      return exportEps(settings.output, source, {
        ...common,
        creator: settings.creator,
      });
    case "pdf":
      return exportPdf(settings.output, source, {
        ...common,
        author: settings.author,
      });
    case "svg":
      return exportSvg(settings.output, source, common);
  }
}

export async function exportCommand(
  input: string,
  options: ExportCommandOptions,
): Promise<void> {
  try {
    const content = readFileSync(input, "utf-8");
    const config = parseLayout(content, { source: input });
    const settings = resolveExportSettings(input, config, options);

    const outliner =
      settings.fontFile !== undefined
        ? new FontkitOutliner(settings.fontFile)
        : undefined;
    // Layout must be measured with the same metrics the text is drawn with
    const panel = buildCompositePanel(
      config,
      outliner ?? new EstimatedTextMetrics(),
    );

    const outcome = await runExport(settings, panel, outliner);
    if (!outcome.success) {
      console.error(
        `Export failed (${outcome.failure.kind}): ${outcome.failure.message}`,
      );
      process.exit(1);
    }
    console.log(`Exported: ${settings.output}`);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
