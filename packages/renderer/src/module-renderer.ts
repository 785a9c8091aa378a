/**
 * Module renderer - one dot per dark module outside the finder zones
 */

import type { RGBA } from "@qr-eyes/core";
import type { ModuleGrid } from "./encoder.js";
import { isFinderModule } from "./finder.js";
import type { RenderSurface } from "./surface.js";

/** Dot radius is the module size divided by this */
export const MODULE_DOT_DIVISOR = 3;

/**
 * Draw every dark, non-finder module as a filled circle.
 *
 * The circle is centered on the module's top-left corner, not its middle.
 * Existing renders depend on that offset.
 */
export function renderModules(
  surface: RenderSurface,
  grid: ModuleGrid,
  moduleSize: number,
  color: RGBA
): void {
  const radius = moduleSize / MODULE_DOT_DIVISOR;
  const count = grid.size;

  for (let x = 0; x < count; x++) {
    for (let y = 0; y < count; y++) {
      if (isFinderModule(x, y, count)) continue;
      if (!grid.isDark(y, x)) continue;
      surface.drawFilledCircle({ x: x * moduleSize, y: y * moduleSize }, radius, color);
    }
  }
}
