import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import type { Logger, VectorSource } from "@pagevector/core";
import { DEFAULT_SVG_TITLE, createSvgDocument, exportSvg } from "../src/index.js";

function quietLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function square(rendered = true): VectorSource {
  return {
    getBounds: () => ({ minX: 0, minY: 0, maxX: 306, maxY: 396 }),
    vectorize: (dc) => {
      dc.rect(0, 0, 10, 10, { fill: "#ff0000" });
      return rendered;
    },
  };
}

describe("createSvgDocument", () => {
  it("maps the source onto a Letter page", () => {
    const { svg, rendered, width, height } = createSvgDocument(square(), {
      title: "Test",
    });
    expect(rendered).toBe(true);
    expect([width, height]).toEqual([612, 792]);
    expect(svg.split("\n")).toEqual([
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 612 792" width="612" height="792">`,
      "<title>Test</title>",
      `<g transform="matrix(2 0 0 2 0 0)">`,
      `<rect x="0" y="0" width="10" height="10" fill="#ff0000"/>`,
      "</g>",
      "</svg>",
    ]);
  });

  it("rounds the canvas up to whole units", () => {
    const { svg, width, height } = createSvgDocument(square(), {
      pageWidth: 595.28,
      pageHeight: 841.89,
    });
    expect([width, height]).toEqual([596, 842]);
    expect(svg).toContain(`viewBox="0 0 596 842"`);
  });

  it("substitutes a placeholder for a missing or empty title", () => {
    expect(createSvgDocument(square()).svg).toContain(
      `<title>${DEFAULT_SVG_TITLE}</title>`,
    );
    expect(createSvgDocument(square(), { title: "" }).svg).toContain(
      "<title>The SVG Document</title>",
    );
  });

  it("escapes the title", () => {
    expect(createSvgDocument(square(), { title: "a<b" }).svg).toContain(
      "<title>a&lt;b</title>",
    );
  });
});

describe("exportSvg", () => {
  it("writes UTF-8 to a stream", async () => {
    const stream = new PassThrough();
    const outcome = await exportSvg(stream, square(), { logger: quietLogger() });
    expect(outcome).toEqual({ success: true });
    expect(stream.read().toString("utf-8")).toMatch(/<\/svg>$/);
  });

  it("still writes the document when the source renders partially", async () => {
    const stream = new PassThrough();
    const outcome = await exportSvg(stream, square(false), { logger: quietLogger() });
    expect(outcome).toEqual({
      success: false,
      failure: {
        kind: "render",
        message: "SVG export: source reported an incomplete render",
      },
    });
    expect(stream.read().toString("utf-8")).toContain("<rect");
  });

  it("reports an unwritable destination as an I/O failure", async () => {
    const outcome = await exportSvg(
      join(tmpdir(), "pagevector-missing-dir", "nested", "out.svg"),
      square(),
      { logger: quietLogger() },
    );
    expect(outcome.success).toBe(false);
    if (!outcome.success) expect(outcome.failure.kind).toBe("io");
  });

  it("reports unencodable text as an encoding failure", async () => {
    const source: VectorSource = {
      getBounds: () => ({ minX: 0, minY: 0, maxX: 10, maxY: 10 }),
      vectorize: (dc) => {
        dc.text(0, 0, "bad \uD800", {
          font: { family: "sans-serif", style: "plain", size: 12 },
        });
        return true;
      },
    };
    const outcome = await exportSvg(new PassThrough(), source, {
      vectorizeText: false,
      logger: quietLogger(),
    });
    expect(outcome.success).toBe(false);
    if (!outcome.success) expect(outcome.failure.kind).toBe("encoding");
  });

  it("reports a closed stream as an I/O failure", async () => {
    const stream = new PassThrough();
    stream.end();
    const outcome = await exportSvg(stream, square(), { logger: quietLogger() });
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failure.kind).toBe("io");
      expect(outcome.failure.message).toBe(
        "Failed to write <stream>: stream is ended or destroyed",
      );
    }
  });

  it("reports a non-finite coordinate as a render failure", async () => {
    const source: VectorSource = {
      getBounds: () => ({ minX: 0, minY: 0, maxX: 10, maxY: 10 }),
      vectorize: (dc) => {
        dc.rect(0, 0, Number.NaN, 1);
        return true;
      },
    };
    const outcome = await exportSvg(new PassThrough(), source, {
      logger: quietLogger(),
    });
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failure.kind).toBe("render");
      expect(outcome.failure.message).toBe("Cannot write non-finite number NaN");
    }
  });
});
