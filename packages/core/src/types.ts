/**
 * Core types shared by the renderer and the CLI
 */

/** RGBA color (0-255 per channel, straight alpha) */
export interface RGBA {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** Canvas dimensions in pixels */
export interface Size {
  width: number;
  height: number;
}

/** A point in pixel space */
export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle, left/top plus extent */
export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** A raster image */
export interface Frame {
  width: number;
  height: number;
  /** Flat array of RGBA values: [r0,g0,b0,a0, r1,g1,b1,a1, ...] */
  pixels: Uint8Array;
}

/** Shortest side of a size; the renderer always draws a square */
export function shortestSide(size: Size): number {
  return Math.min(size.width, size.height);
}

/** Center point of a rectangle */
export function rectCenter(rect: Rect): Point {
  return {
    x: rect.left + rect.width / 2,
    y: rect.top + rect.height / 2,
  };
}
