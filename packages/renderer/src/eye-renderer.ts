/**
 * Finder eye renderer
 *
 * Each finder zone is drawn as an "eye": a ring inscribed in a 6x6-module
 * square anchored at the zone origin, and a solid dot inscribed in a 3x3-module
 * square centered inside it.
 *
 *   outer square        inner square
 *   ┌──────────┐
 *   │  ┌────┐  │        offset 1.5 modules on both axes
 *   │  │ ●● │  │        side 3 modules
 *   │  └────┘  │
 *   └──────────┘        side 6 modules, ring stroke 1 module
 */

import type { Rect, RGBA } from "@qr-eyes/core";
import { rectCenter } from "@qr-eyes/core";
import { FINDER_SIZE, finderZones, type FinderCorner } from "./finder.js";
import type { RenderSurface } from "./surface.js";

/** Outer ring diameter in modules */
export const EYE_OUTER_MODULES = FINDER_SIZE - 1;
/** Inner dot diameter in modules */
export const EYE_INNER_MODULES = EYE_OUTER_MODULES / 2;
/** Inner square offset from the outer square, in modules */
export const EYE_INNER_OFFSET_MODULES = 1.5;

export interface FinderEye {
  corner: FinderCorner;
  /** Bounding square of the stroked ring */
  outer: Rect;
  /** Bounding square of the filled dot */
  inner: Rect;
  /** Ring stroke width */
  strokeWidth: number;
}

/**
 * Pixel-space geometry of the three eyes
 */
export function finderEyeGeometry(moduleSize: number, moduleCount: number): FinderEye[] {
  const outerSide = EYE_OUTER_MODULES * moduleSize;
  const innerSide = EYE_INNER_MODULES * moduleSize;
  const innerOffset = EYE_INNER_OFFSET_MODULES * moduleSize;

  return finderZones(moduleCount).map((zone) => {
    const left = zone.x * moduleSize;
    const top = zone.y * moduleSize;
    return {
      corner: zone.corner,
      outer: { left, top, width: outerSide, height: outerSide },
      inner: {
        left: left + innerOffset,
        top: top + innerOffset,
        width: innerSide,
        height: innerSide,
      },
      strokeWidth: moduleSize,
    };
  });
}

/**
 * Draw all three eyes. Must run after the modules so the eyes sit on top.
 */
export function renderFinderEyes(
  surface: RenderSurface,
  moduleSize: number,
  moduleCount: number,
  color: RGBA
): void {
  for (const eye of finderEyeGeometry(moduleSize, moduleCount)) {
    surface.drawRing(eye.outer, eye.strokeWidth, color);
    surface.drawFilledCircle(rectCenter(eye.inner), eye.inner.width / 2, color);
  }
}
