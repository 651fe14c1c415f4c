import { z } from "zod";
import type { PaperName } from "../graphics/paper.js";
import type { LayoutAxis } from "../panel/vectorization-panel.js";
import type { ColorMode, FontFamily, FontStyle } from "./geometry.js";

// ---- Config interfaces ----

export interface LayoutConfig {
  version: string;
  title?: string;
  titleFont?: FontConfig;
  background?: string;
  compositor?: CompositorConfig;
  rows: RegionConfig[][];
  export?: ExportConfig;
}

export interface FontConfig {
  family?: FontFamily;
  style?: FontStyle;
  size?: number;
}

export interface CompositorConfig {
  titlePaddingBottom?: number;
  rowMargin?: number;
}

export interface RegionConfig {
  id: string;
  padding?: number;
  axis?: LayoutAxis;
  components: ComponentConfig[];
}

export type ComponentConfig = LabelConfig | CheckBoxConfig;

export interface LabelConfig {
  type: "label";
  text: string;
  font?: FontConfig;
}

export interface CheckBoxConfig {
  type: "checkbox";
  text: string;
  selected?: boolean;
  font?: FontConfig;
}

export interface ExportConfig {
  paper?: PaperName;
  pageWidth?: number;
  pageHeight?: number;
  colorMode?: ColorMode;
  vectorizeText?: boolean;
  creator?: string;
  author?: string;
  /** TrueType/OpenType file used for vectorized text outlines */
  fontFile?: string;
}

// ---- Zod schemas for runtime validation ----

const ColorSchema = z
  .string()
  .regex(/^#([0-9a-f]{3}|[0-9a-f]{6})$/i, "expected #rgb or #rrggbb");

const FontSchema = z.object({
  family: z.enum(["sans-serif", "serif", "monospace"]).optional(),
  style: z.enum(["plain", "bold", "italic", "bold-italic"]).optional(),
  size: z.number().positive().optional(),
});

const LabelSchema = z.object({
  type: z.literal("label"),
  text: z.string(),
  font: FontSchema.optional(),
});

const CheckBoxSchema = z.object({
  type: z.literal("checkbox"),
  text: z.string(),
  selected: z.boolean().optional(),
  font: FontSchema.optional(),
});

const RegionSchema = z.object({
  id: z.string().min(1),
  padding: z.number().nonnegative().optional(),
  axis: z.enum(["page", "line"]).optional(),
  components: z.array(z.discriminatedUnion("type", [LabelSchema, CheckBoxSchema])),
});

const ExportSchema = z.object({
  paper: z.enum(["letter", "legal", "tabloid", "a4", "a3"]).optional(),
  pageWidth: z.number().positive().optional(),
  pageHeight: z.number().positive().optional(),
  colorMode: z.enum(["rgb", "cmyk"]).optional(),
  vectorizeText: z.boolean().optional(),
  creator: z.string().optional(),
  author: z.string().optional(),
  fontFile: z.string().optional(),
});

export const LayoutConfigSchema = z.object({
  version: z.string(),
  title: z.string().optional(),
  titleFont: FontSchema.optional(),
  background: ColorSchema.optional(),
  compositor: z
    .object({
      titlePaddingBottom: z.number().nonnegative().optional(),
      rowMargin: z.number().optional(),
    })
    .optional(),
  rows: z.array(z.array(RegionSchema).min(1)).min(1),
  export: ExportSchema.optional(),
});
