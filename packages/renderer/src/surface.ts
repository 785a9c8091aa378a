/**
 * Drawing surface abstraction
 *
 * The engine only ever needs three primitives. Concrete surfaces either
 * record the calls (RecordingSurface) or rasterize them (FrameSurface).
 */

import type { Point, Rect, RGBA } from "@qr-eyes/core";

export interface RenderSurface {
  /** Cover the whole surface with a color */
  fillBackground(color: RGBA): void;
  /** Filled disk */
  drawFilledCircle(center: Point, radius: number, color: RGBA): void;
  /**
   * Circle inscribed in `bounds`, stroked with `strokeWidth` centered on the
   * circle's edge
   */
  drawRing(bounds: Rect, strokeWidth: number, color: RGBA): void;
}

export type DrawCommand =
  | { op: "fillBackground"; color: RGBA }
  | { op: "filledCircle"; center: Point; radius: number; color: RGBA }
  | { op: "ring"; bounds: Rect; strokeWidth: number; color: RGBA };

/**
 * Issue a recorded command against a surface
 */
export function applyCommand(surface: RenderSurface, command: DrawCommand): void {
  switch (command.op) {
    case "fillBackground":
      surface.fillBackground(command.color);
      return;
    case "filledCircle":
      surface.drawFilledCircle(command.center, command.radius, command.color);
      return;
    case "ring":
      surface.drawRing(command.bounds, command.strokeWidth, command.color);
      return;
  }
}
