/**
 * ASCII renderer for debugging frame output
 * Converts a Frame to ASCII art for terminal/text visualization
 */

import type { Frame } from "@qr-eyes/core";
import { getPixel } from "@qr-eyes/core";

export interface AsciiOptions {
  /** Ink (0-1) at or above which a pixel prints as "#" (default: 0.5) */
  threshold?: number;
}

/**
 * How much "ink" a pixel carries: darkness weighted by opacity.
 * Transparent pixels carry none, opaque black carries 1.
 */
export function pixelInk(frame: Frame, x: number, y: number): number {
  const pixel = getPixel(frame, x, y);
  if (!pixel) return 0;
  const brightness = (pixel.r + pixel.g + pixel.b) / 3;
  return (1 - brightness / 255) * (pixel.a / 255);
}

/**
 * Convert a frame to ASCII art, one character per pixel
 */
export function frameToAscii(frame: Frame, options: AsciiOptions = {}): string {
  const threshold = options.threshold ?? 0.5;
  const lines: string[] = [];

  lines.push("┌" + "─".repeat(frame.width) + "┐");
  for (let y = 0; y < frame.height; y++) {
    let line = "│";
    for (let x = 0; x < frame.width; x++) {
      line += pixelInk(frame, x, y) >= threshold ? "#" : ".";
    }
    lines.push(line + "│");
  }
  lines.push("└" + "─".repeat(frame.width) + "┘");

  return lines.join("\n");
}
