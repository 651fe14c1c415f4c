#!/usr/bin/env node
import { Command } from "commander";
import { exportCommand } from "./commands/export.js";
import { initCommand } from "./commands/init.js";

const program = new Command();

program
  .name("pagevector")
  .description("Export panel layouts to EPS, SVG and PDF")
  .version("0.1.0");

program
  .command("export <layout>")
  .description("Export a YAML/JSON panel layout to a vector document")
  .option("-f, --format <format>", "Output format: eps, svg, pdf (default: from --output, else svg)")
  .option("-o, --output <file>", "Output file path (default: <layout>.<format>)")
  .option("--title <title>", "Document title (default: layout title)")
  .option("--creator <name>", "EPS %%Creator comment")
  .option("--author <name>", "PDF Author entry")
  .option("--paper <name>", "Paper size: letter, legal, tabloid, a4, a3")
  .option("--page-width <points>", "Page width in points")
  .option("--page-height <points>", "Page height in points")
  .option("--color-mode <mode>", "Color mode: rgb, cmyk")
  .option("--no-vectorize-text", "Write text as native font text")
  .option("--font <file>", "TrueType/OpenType font for text outlines")
  .action(exportCommand);

program
  .command("init")
  .description("Print a template panel layout")
  .option("-t, --template <name>", "Template name (demo, single-region)", "demo")
  .action(initCommand);

await program.parseAsync();
