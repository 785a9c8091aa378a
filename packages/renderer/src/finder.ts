/**
 * Finder zone math
 *
 * A QR symbol carries three 7x7 finder patterns: top-left, top-right and
 * bottom-left. There is never one at the bottom-right.
 *
 * Coordinates are module-space: x is the column, y is the row.
 */

export const FINDER_SIZE = 7;

export type FinderCorner = "topLeft" | "topRight" | "bottomLeft";

export const FINDER_CORNERS: readonly FinderCorner[] = ["topLeft", "topRight", "bottomLeft"];

/** A finder corner and the module-space square it occupies */
export interface FinderZone {
  corner: FinderCorner;
  /** Leftmost column */
  x: number;
  /** Topmost row */
  y: number;
  size: number;
}

function isTopLeft(x: number, y: number): boolean {
  return x < FINDER_SIZE && y < FINDER_SIZE;
}

function isTopRight(x: number, y: number, moduleCount: number): boolean {
  return x > moduleCount - FINDER_SIZE - 1 && y < FINDER_SIZE;
}

function isBottomLeft(x: number, y: number, moduleCount: number): boolean {
  return x < FINDER_SIZE && y > moduleCount - FINDER_SIZE - 1;
}

/**
 * Whether the module at column x, row y lies inside any finder zone.
 * For grids smaller than 15 modules the zones overlap; any match counts.
 */
export function isFinderModule(x: number, y: number, moduleCount: number): boolean {
  return isTopLeft(x, y) || isTopRight(x, y, moduleCount) || isBottomLeft(x, y, moduleCount);
}

/**
 * Module-space origin of a finder zone
 */
export function finderOrigin(corner: FinderCorner, moduleCount: number): { x: number; y: number } {
  const far = moduleCount - FINDER_SIZE;
  switch (corner) {
    case "topLeft":
      return { x: 0, y: 0 };
    case "topRight":
      return { x: far, y: 0 };
    case "bottomLeft":
      return { x: 0, y: far };
  }
}

export function finderZones(moduleCount: number): FinderZone[] {
  return FINDER_CORNERS.map((corner) => ({
    corner,
    ...finderOrigin(corner, moduleCount),
    size: FINDER_SIZE,
  }));
}
