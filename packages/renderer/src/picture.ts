/**
 * Recorded drawings
 *
 * A RecordingSurface captures draw calls without rasterizing them. The
 * resulting Picture can be replayed onto any surface, or rasterized at
 * whatever pixel size the caller asks for.
 */

import type { Frame, Point, Rect, RGBA, Size } from "@qr-eyes/core";
import { createSolidFrame } from "@qr-eyes/core";
import { FrameSurface } from "./frame-surface.js";
import { applyCommand, type DrawCommand, type RenderSurface } from "./surface.js";

/**
 * Whole pixels covered by a drawing extent
 */
export function pixelExtent(extent: number): number {
  if (!Number.isFinite(extent)) {
    throw new RangeError(`Image size must be finite, got ${extent}`);
  }
  return Math.max(0, Math.trunc(extent));
}

export class Picture {
  constructor(
    /** Size the drawing was recorded for */
    readonly size: Size,
    readonly commands: readonly DrawCommand[]
  ) {}

  replay(surface: RenderSurface): void {
    for (const command of this.commands) {
      applyCommand(surface, command);
    }
  }

  /**
   * Rasterize onto a fresh transparent frame, by default at the recorded size
   */
  toImage(
    width: number = pixelExtent(this.size.width),
    height: number = pixelExtent(this.size.height)
  ): Frame {
    const frame = createSolidFrame(width, height);
    this.replay(new FrameSurface(frame));
    return frame;
  }
}

export class RecordingSurface implements RenderSurface {
  private commands: DrawCommand[] = [];

  fillBackground(color: RGBA): void {
    this.commands.push({ op: "fillBackground", color: { ...color } });
  }

  drawFilledCircle(center: Point, radius: number, color: RGBA): void {
    this.commands.push({ op: "filledCircle", center: { ...center }, radius, color: { ...color } });
  }

  drawRing(bounds: Rect, strokeWidth: number, color: RGBA): void {
    this.commands.push({ op: "ring", bounds: { ...bounds }, strokeWidth, color: { ...color } });
  }

  /** Hand over everything drawn so far and start an empty recording */
  finish(size: Size): Picture {
    const recorded = this.commands;
    this.commands = [];
    return new Picture({ ...size }, Object.freeze(recorded));
  }
}
