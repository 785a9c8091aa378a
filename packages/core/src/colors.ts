/**
 * Shared color definitions and hex parsing
 */

import type { RGBA } from "./types.js";

export const COLORS = {
  // Default module color
  black: { r: 0, g: 0, b: 0, a: 255 },
  white: { r: 255, g: 255, b: 255, a: 255 },
  // Fresh frames start out transparent
  transparent: { r: 0, g: 0, b: 0, a: 0 },
} satisfies Record<string, RGBA>;

const HEX_PATTERN = /^#?([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse a hex color string.
 * Accepts #rgb, #rrggbb and #rrggbbaa (leading # optional).
 * Returns null when the string is not a valid color.
 */
export function parseColor(input: string): RGBA | null {
  const match = HEX_PATTERN.exec(input.trim());
  if (!match) return null;

  let hex = match[1];
  if (hex.length === 3) {
    hex = hex
      .split("")
      .map((c) => c + c)
      .join("");
  }

  const channel = (i: number): number => parseInt(hex.slice(i, i + 2), 16);
  return {
    r: channel(0),
    g: channel(2),
    b: channel(4),
    a: hex.length === 8 ? channel(6) : 255,
  };
}

export function colorsEqual(a: RGBA, b: RGBA): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}
