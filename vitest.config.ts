import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages export built JS at runtime; tests run their sources.
function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@pagevector/core": source("core"),
      "@pagevector/render-svg": source("render-svg"),
      "@pagevector/render-eps": source("render-eps"),
      "@pagevector/render-pdf": source("render-pdf"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/__tests__/**/*.test.ts"],
    // pdfkit streams and temp-file writes
    testTimeout: 10_000,
  },
});
