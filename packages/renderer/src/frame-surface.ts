/**
 * Raster surface - draws primitives straight into a Frame
 *
 * Coverage is sampled once per pixel at the pixel center, with no
 * anti-aliasing, so the same commands always produce the same bytes.
 */

import type { Frame, Point, Rect, RGBA } from "@qr-eyes/core";
import { blendPixel, rectCenter } from "@qr-eyes/core";
import type { RenderSurface } from "./surface.js";

interface PixelRange {
  x0: number;
  x1: number;
  y0: number;
  y1: number;
}

export class FrameSurface implements RenderSurface {
  constructor(readonly frame: Frame) {}

  fillBackground(color: RGBA): void {
    for (let y = 0; y < this.frame.height; y++) {
      for (let x = 0; x < this.frame.width; x++) {
        blendPixel(this.frame, x, y, color);
      }
    }
  }

  drawFilledCircle(center: Point, radius: number, color: RGBA): void {
    if (radius <= 0) return;
    const limit = radius * radius;
    this.fillWhere(this.rangeAround(center, radius), center, color, (dx, dy) => {
      return dx * dx + dy * dy <= limit;
    });
  }

  drawRing(bounds: Rect, strokeWidth: number, color: RGBA): void {
    const center = rectCenter(bounds);
    const radius = Math.min(bounds.width, bounds.height) / 2;
    const half = strokeWidth / 2;
    const innerRadius = Math.max(0, radius - half);
    const outerRadius = radius + half;
    if (outerRadius <= 0 || strokeWidth <= 0) return;

    const innerLimit = innerRadius * innerRadius;
    const outerLimit = outerRadius * outerRadius;
    this.fillWhere(this.rangeAround(center, outerRadius), center, color, (dx, dy) => {
      const d = dx * dx + dy * dy;
      return d >= innerLimit && d <= outerLimit;
    });
  }

  /** Pixels whose centers could fall within `radius` of `center`, clipped */
  private rangeAround(center: Point, radius: number): PixelRange {
    return {
      x0: Math.max(0, Math.floor(center.x - radius)),
      x1: Math.min(this.frame.width - 1, Math.ceil(center.x + radius)),
      y0: Math.max(0, Math.floor(center.y - radius)),
      y1: Math.min(this.frame.height - 1, Math.ceil(center.y + radius)),
    };
  }

  private fillWhere(
    range: PixelRange,
    center: Point,
    color: RGBA,
    covers: (dx: number, dy: number) => boolean
  ): void {
    for (let y = range.y0; y <= range.y1; y++) {
      const dy = y + 0.5 - center.y;
      for (let x = range.x0; x <= range.x1; x++) {
        if (covers(x + 0.5 - center.x, dy)) {
          blendPixel(this.frame, x, y, color);
        }
      }
    }
  }
}
