#!/usr/bin/env node
/**
 * qr-eyes CLI
 *
 * Usage:
 *   npm run cli -- render "https://example.com" -o code.png
 *   npm run cli -- preview "HELLO"
 */

import { program } from "commander";
import type { RGBA } from "@qr-eyes/core";
import type { ErrorCorrectionLevel, ImageByteFormat } from "@qr-eyes/renderer";
import {
  describeFailure,
  parseColorOption,
  parseFormatOption,
  parseLevelOption,
  parseSizeOption,
  parseVersionOption,
  renderPreview,
  renderToFile,
  type RenderOptions,
} from "./commands.js";
import { loadEnvFile, readDefaults } from "./config.js";

interface SharedFlags {
  size?: number;
  qrVersion: number;
  level?: ErrorCorrectionLevel;
  color?: RGBA;
  background?: RGBA;
  gapless?: boolean;
}

/**
 * Merge command line flags over environment defaults
 */
function resolveOptions(flags: SharedFlags): RenderOptions {
  const defaults = readDefaults();
  return {
    size: flags.size ?? defaults.size,
    qrVersion: flags.qrVersion,
    level: flags.level ?? defaults.level,
    color: flags.color ?? defaults.color,
    background: flags.background ?? defaults.background,
    gapless: flags.gapless ?? defaults.gapless,
  };
}

loadEnvFile();

program
  .name("qr-eyes")
  .description("Render QR codes with dotted modules and round finder eyes")
  .version("0.1.0");

program
  .command("render")
  .description("Render a QR code to an image file")
  .argument("<data>", "Text to encode")
  .requiredOption("-o, --out <file>", "Output file")
  .option("-s, --size <px>", "Image size in pixels", parseSizeOption)
  .option("-v, --qr-version <n>", "Symbol version 1-40, or auto", parseVersionOption, -1)
  .option("-l, --level <level>", "Error correction level (L, M, Q, H)", parseLevelOption)
  .option("-c, --color <hex>", "Module color", parseColorOption)
  .option("-b, --background <hex>", "Background color (default: transparent)", parseColorOption)
  .option("--gapless", "Grow modules by one pixel to hide seams")
  .option("-f, --format <format>", "png or raw", parseFormatOption, "png")
  .action(async (data: string, flags: SharedFlags & { out: string; format: ImageByteFormat }) => {
    const options = resolveOptions(flags);
    try {
      const result = await renderToFile(data, options, flags.out, flags.format);
      if (!result.ok) {
        console.error(`[cli] Could not encode data: ${describeFailure(result.failure)}`);
        process.exit(1);
      }
      console.log(`Wrote ${result.bytes} bytes to ${flags.out}`);
    } catch (error) {
      console.error("[cli] Render failed:", error);
      process.exit(1);
    }
  });

program
  .command("preview")
  .description("Print an ASCII preview of a QR code")
  .argument("<data>", "Text to encode")
  .option("-s, --size <px>", "Preview size in pixels", parseSizeOption)
  .option("-v, --qr-version <n>", "Symbol version 1-40, or auto", parseVersionOption, -1)
  .option("-l, --level <level>", "Error correction level (L, M, Q, H)", parseLevelOption)
  .action((data: string, flags: SharedFlags) => {
    const options = resolveOptions(flags);
    const result = renderPreview(data, options, flags.size);
    if (!result.ok) {
      console.error(`[cli] Could not encode data: ${describeFailure(result.failure)}`);
      process.exit(1);
    }
    console.log(result.text);
  });

program.parseAsync().catch((error: unknown) => {
  console.error("[cli] Error:", error);
  process.exit(1);
});
