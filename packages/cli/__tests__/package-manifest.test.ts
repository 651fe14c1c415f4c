import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { z } from "zod";

const packagesDir = fileURLToPath(new URL("../../", import.meta.url));

const ManifestSchema = z.object({
  name: z.string(),
  main: z.string().optional(),
  bin: z.record(z.string()).optional(),
  exports: z
    .record(z.object({ types: z.string(), default: z.string() }))
    .optional(),
});

const BuildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson<T>(schema: z.ZodType<T>, path: string): T {
  return schema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

/** The TypeScript source a built `./dist/*.js` file is compiled from. */
function sourceOf(pkg: string, built: string): string {
  return join(packagesDir, pkg, built.replace(/^\.\/dist\//, "src/").replace(/\.js$/, ".ts"));
}

describe.each(["core", "render-svg", "render-eps", "render-pdf"])(
  "@pagevector/%s manifest",
  (pkg) => {
    const manifest = readJson(ManifestSchema, join(packagesDir, pkg, "package.json"));

    it("loads built JavaScript at runtime and sources for types", () => {
      const root = manifest.exports?.["."];
      expect(root?.default).toBe("./dist/index.js");
      expect(root?.types).toBe("./src/index.ts");
      expect(manifest.main).toBe("./dist/index.js");
      expect(existsSync(sourceOf(pkg, "./dist/index.js"))).toBe(true);
    });

    it("builds src into dist", () => {
      const config = readJson(BuildConfigSchema, join(packagesDir, pkg, "tsconfig.json"));
      expect(config.compilerOptions).toEqual({ rootDir: "src", outDir: "dist" });
    });
  },
);

describe("@pagevector/cli manifest", () => {
  const manifest = readJson(ManifestSchema, join(packagesDir, "cli", "package.json"));

  it("points the bin at the compiled entry", () => {
    const bin = manifest.bin?.["pagevector"];
    expect(bin).toBe("./dist/index.js");
    if (bin === undefined) return;
    const source = readFileSync(sourceOf("cli", bin), "utf-8");
    expect(source.startsWith("#!/usr/bin/env node\n")).toBe(true);
  });
});
