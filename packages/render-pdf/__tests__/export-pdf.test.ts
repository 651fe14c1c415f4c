import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import type { Logger, VectorSource } from "@pagevector/core";
import { createPdfDocument, exportPdf } from "../src/index.js";

function quietLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function panelLike(rendered = true): VectorSource {
  return {
    getBounds: () => ({ minX: 0, minY: 0, maxX: 306, maxY: 396 }),
    vectorize: (dc) => {
      dc.rect(0, 0, 10, 10, { fill: "#ff0000" });
      dc.text(0, 20, "Hello", {
        font: { family: "sans-serif", style: "bold", size: 12 },
        fill: "#000000",
      });
      return rendered;
    },
  };
}

describe("createPdfDocument", () => {
  it("writes a one-page PDF with document info", async () => {
    const { pdf, rendered } = await createPdfDocument(panelLike(), {
      title: "Test",
      author: "Saved from pagevector",
      compress: false,
      vectorizeText: false,
      logger: quietLogger(),
    });
    const text = pdf.toString("latin1");

    expect(rendered).toBe(true);
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(text).toContain("/Title (Test)");
    expect(text).toContain("/Author (Saved from pagevector)");
    expect(text).toContain("/MediaBox [0 0 612 792]");
    expect(text).toContain("/BaseFont /Helvetica-Bold");
  });

  it("concatenates the page transform", async () => {
    const { pdf } = await createPdfDocument(panelLike(), {
      compress: false,
      vectorizeText: false,
      logger: quietLogger(),
    });
    expect(pdf.toString("latin1")).toContain("2 0 0 2 0 0 cm");
  });

  it("omits a null author", async () => {
    const { pdf } = await createPdfDocument(panelLike(), {
      author: null,
      compress: false,
      vectorizeText: false,
      logger: quietLogger(),
    });
    expect(pdf.toString("latin1")).not.toContain("/Author");
  });

  it("uses the CMYK color space in CMYK mode", async () => {
    const { pdf } = await createPdfDocument(panelLike(), {
      colorMode: "cmyk",
      compress: false,
      vectorizeText: false,
      logger: quietLogger(),
    });
    expect(pdf.toString("latin1")).toContain("/DeviceCMYK");
  });

  it("honors a custom page size", async () => {
    const { pdf } = await createPdfDocument(panelLike(), {
      pageWidth: 200,
      pageHeight: 100,
      compress: false,
      vectorizeText: false,
      logger: quietLogger(),
    });
    expect(pdf.toString("latin1")).toContain("/MediaBox [0 0 200 100]");
  });
});

describe("exportPdf", () => {
  it("writes the PDF bytes to the sink", async () => {
    const stream = new PassThrough();
    const outcome = await exportPdf(stream, panelLike(), {
      vectorizeText: false,
      logger: quietLogger(),
    });
    expect(outcome).toEqual({ success: true });
    expect(stream.read().subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("passes a partial render through", async () => {
    const outcome = await exportPdf(new PassThrough(), panelLike(false), {
      vectorizeText: false,
      logger: quietLogger(),
    });
    expect(outcome).toEqual({
      success: false,
      failure: {
        kind: "render",
        message: "PDF export: source reported an incomplete render",
      },
    });
  });

  it("reports a throwing source as a render failure", async () => {
    const source: VectorSource = {
      getBounds: () => ({ minX: 0, minY: 0, maxX: 1, maxY: 1 }),
      vectorize: () => {
        throw new Error("region exploded");
      },
    };
    const outcome = await exportPdf(new PassThrough(), source, {
      logger: quietLogger(),
    });
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failure.kind).toBe("render");
      expect(outcome.failure.message).toBe(
        "Document assembly failed: region exploded",
      );
    }
  });
});
