/**
 * Frame pixel primitives
 *
 * Frame format:
 * - width x height pixels, row-major
 * - RGBA (4 bytes per pixel), straight alpha
 * - A fresh frame is fully transparent
 */

import type { Frame, RGBA } from "./types.js";
import { COLORS } from "./colors.js";

/** Bytes per pixel (RGBA) */
export const BYTES_PER_PIXEL = 4;

/**
 * Create a frame filled with a single color
 */
export function createSolidFrame(
  width: number,
  height: number,
  color: RGBA = COLORS.transparent
): Frame {
  const pixels = new Uint8Array(width * height * BYTES_PER_PIXEL);
  for (let i = 0; i < width * height; i++) {
    const offset = i * BYTES_PER_PIXEL;
    pixels[offset] = color.r;
    pixels[offset + 1] = color.g;
    pixels[offset + 2] = color.b;
    pixels[offset + 3] = color.a;
  }
  return { width, height, pixels };
}

/**
 * Set a single pixel in a frame, replacing whatever was there
 */
export function setPixel(
  frame: Frame,
  x: number,
  y: number,
  color: RGBA
): void {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return; // Out of bounds, silently ignore
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  frame.pixels[offset] = color.r;
  frame.pixels[offset + 1] = color.g;
  frame.pixels[offset + 2] = color.b;
  frame.pixels[offset + 3] = color.a;
}

/**
 * Get a pixel color from a frame
 */
export function getPixel(frame: Frame, x: number, y: number): RGBA | null {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return null;
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  return {
    r: frame.pixels[offset],
    g: frame.pixels[offset + 1],
    b: frame.pixels[offset + 2],
    a: frame.pixels[offset + 3],
  };
}

/**
 * Composite a color over a single pixel (source-over).
 * Opaque colors overwrite; transparent colors leave the pixel untouched.
 */
export function blendPixel(
  frame: Frame,
  x: number,
  y: number,
  color: RGBA
): void {
  if (color.a >= 255) {
    setPixel(frame, x, y, color);
    return;
  }
  if (color.a <= 0) return;

  const dst = getPixel(frame, x, y);
  if (!dst) return;

  const srcA = color.a / 255;
  const dstA = dst.a / 255;
  const outA = srcA + dstA * (1 - srcA);
  const channel = (src: number, d: number): number =>
    Math.round((src * srcA + d * dstA * (1 - srcA)) / outA);

  setPixel(frame, x, y, {
    r: channel(color.r, dst.r),
    g: channel(color.g, dst.g),
    b: channel(color.b, dst.b),
    a: Math.round(outA * 255),
  });
}
