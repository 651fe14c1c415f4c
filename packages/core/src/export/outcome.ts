import type { GlyphOutliner } from "../graphics/text-metrics.js";
import { DEFAULT_PAGE_SIZE } from "../graphics/paper.js";
import type { ColorMode, PageSize } from "../types/geometry.js";
import {
  ExportError,
  RenderError,
  errorMessage,
  type ExportFailureKind,
} from "./errors.js";
import { defaultLogger, type Logger } from "./logger.js";
import { writeToSink, type ExportSink } from "./sink.js";

export interface ExportFailure {
  kind: ExportFailureKind;
  message: string;
  /** Absent for a partial render, which is reported rather than thrown. */
  error?: ExportError;
}

export type ExportOutcome =
  | { success: true }
  | { success: false; failure: ExportFailure };

/**
 * Options shared by every format exporter. Defaults: North American Letter,
 * RGB, vectorized text.
 */
export interface ExportOptions {
  /** Document title; null is permitted. */
  title?: string | null;
  pageWidth?: number;
  pageHeight?: number;
  colorMode?: ColorMode;
  vectorizeText?: boolean;
  /** Required for vectorized text; without it text falls back to native glyphs. */
  outliner?: GlyphOutliner;
  logger?: Logger;
}

export interface ResolvedExportOptions {
  title: string | null;
  page: PageSize;
  colorMode: ColorMode;
  vectorizeText: boolean;
  outliner: GlyphOutliner | undefined;
  logger: Logger;
}

export function resolveExportOptions(
  options: ExportOptions = {},
): ResolvedExportOptions {
  return {
    title: options.title ?? null,
    page: {
      width: options.pageWidth ?? DEFAULT_PAGE_SIZE.width,
      height: options.pageHeight ?? DEFAULT_PAGE_SIZE.height,
    },
    colorMode: options.colorMode ?? "rgb",
    vectorizeText: options.vectorizeText ?? true,
    outliner: options.outliner,
    logger: options.logger ?? defaultLogger,
  };
}

/** A fully serialized document plus whether the source rendered completely. */
export interface AssembledDocument {
  data: Buffer;
  rendered: boolean;
}

function toExportError(err: unknown): ExportError {
  if (err instanceof ExportError) return err;
  return new RenderError(`Document assembly failed: ${errorMessage(err)}`, {
    cause: err,
  });
}

/**
 * Assemble a document, write it to the sink, and fold every failure into
 * an `ExportOutcome`. Errors are logged here and nowhere else.
 */
export async function completeExport(
  format: string,
  sink: ExportSink,
  assemble: () => AssembledDocument | Promise<AssembledDocument>,
  logger: Logger,
): Promise<ExportOutcome> {
  try {
    const document = await assemble();
    await writeToSink(sink, document.data);

    if (!document.rendered) {
      const message = `${format} export: source reported an incomplete render`;
      logger.warn(message);
      return { success: false, failure: { kind: "render", message } };
    }
    return { success: true };
  } catch (err) {
    const error = toExportError(err);
    logger.error(`${format} export failed [${error.code}]: ${error.message}`);
    return {
      success: false,
      failure: { kind: error.kind, message: error.message, error },
    };
  }
}
