import { extname } from "node:path";
import yaml from "js-yaml";
import type { ZodIssue } from "zod";
import { errorMessage } from "../export/errors.js";
import { LayoutConfigSchema, type LayoutConfig } from "../types/config.js";

export type LayoutSyntax = "json" | "yaml";

export interface ParseLayoutOptions {
  /** File the layout came from; named in messages, and its extension picks the syntax. */
  source?: string;
}

/** A layout document that could not be decoded or failed validation. */
export class LayoutError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "LayoutError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** `.json` is strict JSON; anything else is read as YAML, which accepts JSON too. */
export function layoutSyntaxOf(source: string | undefined): LayoutSyntax {
  return source !== undefined && extname(source).toLowerCase() === ".json"
    ? "json"
    : "yaml";
}

function decode(input: string, syntax: LayoutSyntax, source?: string): unknown {
  try {
    return syntax === "json"
      ? JSON.parse(input)
      : yaml.load(input, source !== undefined ? { filename: source } : {});
  } catch (err) {
    throw new LayoutError(
      `Could not read ${source ?? "layout"} as ${syntax.toUpperCase()}: ${errorMessage(err)}`,
    );
  }
}

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Decode and validate a layout document. Throws `LayoutError` listing every
 * schema issue by its path into the document.
 */
export function parseLayout(
  input: string,
  options: ParseLayoutOptions = {},
): LayoutConfig {
  const { source } = options;
  const raw = decode(input, layoutSyntaxOf(source), source);

  const result = LayoutConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(describeIssue);
    const where = source !== undefined ? ` in ${source}` : "";
    throw new LayoutError(
      `Invalid layout${where}:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      issues,
    );
  }
  return result.data;
}
