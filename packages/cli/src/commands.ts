/**
 * Command implementations, kept apart from the commander wiring so they can
 * be called directly
 */

import { writeFile } from "fs/promises";
import { InvalidArgumentError } from "commander";
import { parseColor, type RGBA } from "@qr-eyes/core";
import {
  AUTO_VERSION,
  createQrPainter,
  frameToAscii,
  isErrorCorrectionLevel,
  isValidVersion,
  type CreatePainterResult,
  type EncodeFailure,
  type ErrorCorrectionLevel,
  type ImageByteFormat,
} from "@qr-eyes/renderer";

/** Pixel size used for terminal previews: two pixels per module at version 1 */
export const PREVIEW_SIZE = 42;

export interface RenderOptions {
  size: number;
  qrVersion: number;
  level: ErrorCorrectionLevel;
  color: RGBA;
  background: RGBA | null;
  gapless: boolean;
}

// Option parsers for commander: throw InvalidArgumentError on bad input

export function parseSizeOption(value: string): number {
  const size = Number(value);
  if (!Number.isFinite(size) || size <= 0) {
    throw new InvalidArgumentError("Size must be a positive number.");
  }
  return size;
}

export function parseVersionOption(value: string): number {
  const version = value === "auto" ? AUTO_VERSION : Number(value);
  if (!isValidVersion(version)) {
    throw new InvalidArgumentError("Version must be 1-40, -1 or auto.");
  }
  return version;
}

export function parseLevelOption(value: string): ErrorCorrectionLevel {
  const level = value.toUpperCase();
  if (!isErrorCorrectionLevel(level)) {
    throw new InvalidArgumentError("Level must be one of L, M, Q, H.");
  }
  return level;
}

export function parseColorOption(value: string): RGBA {
  const color = parseColor(value);
  if (!color) {
    throw new InvalidArgumentError("Colors are hex: #rgb, #rrggbb or #rrggbbaa.");
  }
  return color;
}

export function parseFormatOption(value: string): ImageByteFormat {
  if (value === "png") return "png";
  if (value === "raw") return "rawRgba";
  throw new InvalidArgumentError("Format must be png or raw.");
}

export function describeFailure(failure: EncodeFailure): string {
  return `${failure.kind}: ${failure.message}`;
}

export function buildPainter(data: string, options: RenderOptions): CreatePainterResult {
  return createQrPainter({
    data,
    version: options.qrVersion,
    errorCorrectionLevel: options.level,
    color: options.color,
    emptyColor: options.background ?? undefined,
    gapless: options.gapless,
  });
}

/**
 * Render to a file. Returns the number of bytes written, or the encode
 * failure when the data could not be encoded.
 */
export async function renderToFile(
  data: string,
  options: RenderOptions,
  outPath: string,
  format: ImageByteFormat
): Promise<{ ok: true; bytes: number } | { ok: false; failure: EncodeFailure }> {
  const result = buildPainter(data, options);
  if (!result.ok) {
    return result;
  }
  const bytes = await result.painter.toImageData(options.size, format);
  await writeFile(outPath, bytes);
  return { ok: true, bytes: bytes.length };
}

/**
 * ASCII preview of the rendered code
 */
export function renderPreview(
  data: string,
  options: RenderOptions,
  size: number = PREVIEW_SIZE
): { ok: true; text: string } | { ok: false; failure: EncodeFailure } {
  const result = buildPainter(data, options);
  if (!result.ok) {
    return result;
  }
  const frame = result.painter.toPicture(size).toImage();
  return { ok: true, text: frameToAscii(frame) };
}
