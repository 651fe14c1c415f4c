/**
 * Typed export errors with machine-readable codes.
 * Exporters catch these at their boundary and report them as an
 * `ExportFailure`; nothing here is thrown past `exportXxx()`.
 */

export type ExportFailureKind = "io" | "encoding" | "render";

export class ExportError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly kind: ExportFailureKind,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ExportError";
    // Keep instanceof working for subclasses after down-levelling
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ExportIoError extends ExportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "IO_ERROR", "io", context);
    this.name = "ExportIoError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EncodingError extends ExportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "ENCODING_ERROR", "encoding", context);
    this.name = "EncodingError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RenderError extends ExportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "RENDER_ERROR", "render", context);
    this.name = "RenderError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
