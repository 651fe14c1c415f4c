import { createWriteStream, mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import {
  EncodingError,
  ExportIoError,
  RenderError,
  completeExport,
  encodeUtf8,
  resolveExportOptions,
  writeToSink,
  type Logger,
} from "../src/index.js";

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("encodeUtf8", () => {
  it("encodes paired surrogates", () => {
    expect(encodeUtf8("é😀")).toEqual(Buffer.from([0xc3, 0xa9, 0xf0, 0x9f, 0x98, 0x80]));
  });

  it("rejects an unpaired surrogate with its offset", () => {
    try {
      encodeUtf8("a\uD800b");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EncodingError);
      if (err instanceof EncodingError) {
        expect(err.kind).toBe("encoding");
        expect(err.message).toBe(
          "Document contains an unpaired UTF-16 surrogate at offset 1",
        );
      }
    }
  });
});

describe("writeToSink", () => {
  it("writes a file path", async () => {
    const path = join(mkdtempSync(join(tmpdir(), "pagevector-")), "out.txt");
    await writeToSink(path, Buffer.from("hello"));
    expect(readFileSync(path, "utf-8")).toBe("hello");
  });

  it("writes to a stream and leaves it open", async () => {
    const stream = new PassThrough();
    await writeToSink(stream, Buffer.from("abc"));
    expect(stream.read()?.toString()).toBe("abc");
    expect(stream.writableEnded).toBe(false);
  });

  it("wraps write failures as I/O errors", async () => {
    const path = join(tmpdir(), "pagevector-missing-dir", "nested", "out.txt");
    await expect(writeToSink(path, Buffer.from("x"))).rejects.toBeInstanceOf(
      ExportIoError,
    );
  });

  it("rejects a stream that has already ended", async () => {
    const stream = new PassThrough();
    stream.end();
    await expect(writeToSink(stream, Buffer.from("x"))).rejects.toThrow(
      "Failed to write <stream>: stream is ended or destroyed",
    );
  });

  it("rejects a file stream whose open fails", async () => {
    const stream = createWriteStream(
      join(tmpdir(), "pagevector-missing-dir", "nested", "out.txt"),
    );
    await expect(writeToSink(stream, Buffer.from("x"))).rejects.toBeInstanceOf(
      ExportIoError,
    );
  });
});

describe("resolveExportOptions", () => {
  it("defaults to Letter, RGB and vectorized text", () => {
    const opts = resolveExportOptions();
    expect(opts.title).toBeNull();
    expect(opts.page).toEqual({ width: 612, height: 792 });
    expect(opts.colorMode).toBe("rgb");
    expect(opts.vectorizeText).toBe(true);
  });
});

describe("completeExport", () => {
  it("reports success after writing", async () => {
    const stream = new PassThrough();
    const outcome = await completeExport(
      "TXT",
      stream,
      () => ({ data: Buffer.from("ok"), rendered: true }),
      silentLogger(),
    );
    expect(outcome).toEqual({ success: true });
    expect(stream.read()?.toString()).toBe("ok");
  });

  it("writes and reports a partial render", async () => {
    const stream = new PassThrough();
    const logger = silentLogger();
    const outcome = await completeExport(
      "TXT",
      stream,
      () => ({ data: Buffer.from("partial"), rendered: false }),
      logger,
    );
    expect(outcome).toEqual({
      success: false,
      failure: {
        kind: "render",
        message: "TXT export: source reported an incomplete render",
      },
    });
    expect(stream.read()?.toString()).toBe("partial");
    expect(logger.warn).toHaveBeenCalledWith(
      "TXT export: source reported an incomplete render",
    );
  });

  it("wraps unexpected assembly errors as render failures", async () => {
    const logger = silentLogger();
    const outcome = await completeExport(
      "TXT",
      new PassThrough(),
      () => {
        throw new Error("bad");
      },
      logger,
    );
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failure.kind).toBe("render");
      expect(outcome.failure.message).toBe("Document assembly failed: bad");
      expect(outcome.failure.error).toBeInstanceOf(RenderError);
    }
    expect(logger.error).toHaveBeenCalledWith(
      "TXT export failed [RENDER_ERROR]: Document assembly failed: bad",
    );
  });

  it("reports I/O failures", async () => {
    const outcome = await completeExport(
      "TXT",
      join(tmpdir(), "pagevector-missing-dir", "nested", "out.txt"),
      () => ({ data: Buffer.from("x"), rendered: true }),
      silentLogger(),
    );
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failure.kind).toBe("io");
      expect(outcome.failure.message).toMatch(/^Failed to write /);
    }
  });

  it("reports a destroyed stream as an I/O failure", async () => {
    const stream = new PassThrough();
    stream.destroy();
    const logger = silentLogger();
    const outcome = await completeExport(
      "TXT",
      stream,
      () => ({ data: Buffer.from("x"), rendered: true }),
      logger,
    );
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failure.kind).toBe("io");
      expect(outcome.failure.error).toBeInstanceOf(ExportIoError);
    }
    expect(logger.error).toHaveBeenCalledWith(
      "TXT export failed [IO_ERROR]: Failed to write <stream>: stream is ended or destroyed",
    );
  });
});
