/**
 * QR painter - the render entry point
 *
 * Construction encodes the data once. From then on the painter is either
 * ready (it has a grid) or failed (the encoder rejected the input). A failed
 * painter never draws anything, background included, and cannot recover.
 */

import type { RGBA, Size } from "@qr-eyes/core";
import { COLORS, colorsEqual, shortestSide } from "@qr-eyes/core";
import {
  AUTO_VERSION,
  encodeWithQrcode,
  type EncodeFailure,
  type EncodeResult,
  type ErrorCorrectionLevel,
  type GridEncoder,
  type ModuleGrid,
} from "./encoder.js";
import { renderFinderEyes } from "./eye-renderer.js";
import { exportPicture, type ImageByteFormat } from "./exporter.js";
import { renderModules } from "./module-renderer.js";
import { RecordingSurface, type Picture } from "./picture.js";
import type { RenderSurface } from "./surface.js";

export type QrErrorCallback = (failure: EncodeFailure) => void;

export interface QrPainterOptions {
  data: string;
  /** Symbol version 1-40; -1 (default) picks the smallest that fits */
  version?: number;
  /** Default: "L" */
  errorCorrectionLevel?: ErrorCorrectionLevel;
  /** Color of dark modules and eyes (default: opaque black) */
  color?: RGBA;
  /** Background color; when unset the background is left untouched */
  emptyColor?: RGBA;
  /** Called once, during construction, if encoding fails */
  onError?: QrErrorCallback;
  /** Grow modules by one pixel to hide seams between neighbours */
  gapless?: boolean;
  /** Replaces the bundled `qrcode` encoder */
  encoder?: GridEncoder;
}

export type PainterState = "ready" | "failed";

export type CreatePainterResult =
  | { ok: true; painter: QrPainter }
  | { ok: false; failure: EncodeFailure };

/**
 * Pixel size of one module. Gapless rendering adds one pixel.
 */
export function computeModuleSize(side: number, moduleCount: number, gapless: boolean): number {
  return side / moduleCount + (gapless ? 1 : 0);
}

/**
 * Cell-by-cell grid comparison; identical references short-circuit
 */
export function gridsEqual(a: ModuleGrid | null, b: ModuleGrid | null): boolean {
  if (a === b) return true;
  if (!a || !b || a.size !== b.size) return false;
  for (let row = 0; row < a.size; row++) {
    for (let col = 0; col < a.size; col++) {
      if (a.isDark(row, col) !== b.isDark(row, col)) return false;
    }
  }
  return true;
}

export class QrPainter {
  /** Requested version, -1 for automatic */
  readonly version: number;
  readonly errorCorrectionLevel: ErrorCorrectionLevel;
  readonly color: RGBA;
  readonly emptyColor: RGBA | null;
  readonly gapless: boolean;

  private readonly result: EncodeResult;

  constructor(options: QrPainterOptions) {
    this.version = options.version ?? AUTO_VERSION;
    this.errorCorrectionLevel = options.errorCorrectionLevel ?? "L";
    this.color = options.color ?? COLORS.black;
    this.emptyColor = options.emptyColor ?? null;
    this.gapless = options.gapless ?? false;

    const encode = options.encoder ?? encodeWithQrcode;
    this.result = encode({
      data: options.data,
      version: this.version,
      errorCorrectionLevel: this.errorCorrectionLevel,
    });

    if (!this.result.ok) {
      options.onError?.(this.result.failure);
    }
  }

  get state(): PainterState {
    return this.result.ok ? "ready" : "failed";
  }

  get hasFailed(): boolean {
    return !this.result.ok;
  }

  get failure(): EncodeFailure | null {
    return this.result.ok ? null : this.result.failure;
  }

  get grid(): ModuleGrid | null {
    return this.result.ok ? this.result.grid : null;
  }

  /** Modules per side, 0 when encoding failed */
  get moduleCount(): number {
    return this.result.ok ? this.result.grid.size : 0;
  }

  /** Version the encoder actually produced, null when encoding failed */
  get symbolVersion(): number | null {
    return this.result.ok ? this.result.version : null;
  }

  /**
   * Draw the code onto a surface, scaled to the size's shortest side
   */
  paint(surface: RenderSurface, size: Size): void {
    if (!this.result.ok) {
      return;
    }
    const { grid } = this.result;
    const side = shortestSide(size);

    if (side === 0) {
      console.warn(
        "[QR] WARN: width or height is zero. Set a non-zero size or paint inside a parent that has one"
      );
    }

    if (this.emptyColor) {
      surface.fillBackground(this.emptyColor);
    }

    const moduleSize = computeModuleSize(side, grid.size, this.gapless);
    renderModules(surface, grid, moduleSize, this.color);
    renderFinderEyes(surface, moduleSize, grid.size, this.color);
  }

  /**
   * Whether a painter replacing `previous` needs to draw again.
   * Anything other than a QrPainter never triggers a repaint.
   */
  shouldRepaint(previous: unknown): boolean {
    if (!(previous instanceof QrPainter)) {
      return false;
    }
    return (
      !colorsEqual(this.color, previous.color) ||
      this.errorCorrectionLevel !== previous.errorCorrectionLevel ||
      this.version !== previous.version ||
      !gridsEqual(this.grid, previous.grid)
    );
  }

  /**
   * Record the drawing for a size x size canvas
   */
  toPicture(size: number): Picture {
    const recorder = new RecordingSurface();
    const canvas: Size = { width: size, height: size };
    this.paint(recorder, canvas);
    return recorder.finish(canvas);
  }

  /**
   * Rasterize at size x size pixels and encode. Only the encode step is async.
   */
  toImageData(size: number, format: ImageByteFormat = "png"): Promise<Uint8Array> {
    return exportPicture(this.toPicture(size), format);
  }
}

/**
 * Build a painter, returning the encode failure instead of reporting it
 * through a callback
 */
export function createQrPainter(options: Omit<QrPainterOptions, "onError">): CreatePainterResult {
  const painter = new QrPainter(options);
  const { failure } = painter;
  if (failure) {
    return { ok: false, failure };
  }
  return { ok: true, painter };
}
