import { describe, it, expect, vi, afterEach } from "vitest";
import { computeModuleSize, createQrPainter, gridsEqual, QrPainter } from "./painter.js";
import { createModuleGrid, type GridEncoder } from "./encoder.js";
import { RecordingSurface } from "./picture.js";
import type { RenderSurface } from "./surface.js";

const WHITE = { r: 255, g: 255, b: 255, a: 255 };
const NAVY = { r: 0, g: 0, b: 128, a: 255 };

function spySurface(): RenderSurface {
  return {
    fillBackground: vi.fn(),
    drawFilledCircle: vi.fn(),
    drawRing: vi.fn(),
  };
}

/** Encoder stub returning an all-light grid of the given size */
function blankEncoder(size: number): GridEncoder {
  return () => ({ ok: true, grid: createModuleGrid(size, new Array<number>(size * size).fill(0)), version: 1 });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("computeModuleSize", () => {
  it("divides the side evenly without gapless", () => {
    expect(computeModuleSize(210, 21, false)).toBe(10);
    expect(computeModuleSize(100, 21, false) * 21).toBeCloseTo(100);
  });

  it("adds one pixel when gapless", () => {
    expect(computeModuleSize(100, 21, true)).toBeCloseTo(100 / 21 + 1);
  });
});

describe("QrPainter", () => {
  it("renders HELLO at version 1 with 10px modules", () => {
    const painter = new QrPainter({ data: "HELLO", version: 1, errorCorrectionLevel: "L" });
    expect(painter.state).toBe("ready");
    expect(painter.moduleCount).toBe(21);

    const { commands } = painter.toPicture(210);

    // Module (0,0) belongs to the top-left eye and gets no dot
    const cornerDots = commands.filter(
      (c) => c.op === "filledCircle" && c.center.x === 0 && c.center.y === 0
    );
    expect(cornerDots).toEqual([]);

    const eyes = commands.slice(-6);
    expect(eyes[0]).toEqual({
      op: "ring",
      bounds: { left: 0, top: 0, width: 60, height: 60 },
      strokeWidth: 10,
      color: { r: 0, g: 0, b: 0, a: 255 },
    });
    // Inner dot inscribed in (15,15)-(45,45)
    expect(eyes[1]).toEqual({
      op: "filledCircle",
      center: { x: 30, y: 30 },
      radius: 15,
      color: { r: 0, g: 0, b: 0, a: 255 },
    });
    expect(eyes.map((c) => c.op)).toEqual([
      "ring",
      "filledCircle",
      "ring",
      "filledCircle",
      "ring",
      "filledCircle",
    ]);
  });

  it("draws module dots with radius of a third of a module", () => {
    const painter = new QrPainter({ data: "HELLO", version: 1 });
    const dots = painter
      .toPicture(210)
      .commands.slice(0, -6)
      .filter((c) => c.op === "filledCircle");

    expect(dots.length).toBeGreaterThan(0);
    for (const dot of dots) {
      if (dot.op === "filledCircle") expect(dot.radius).toBeCloseTo(10 / 3);
    }
  });

  it("uses the shortest side of a non-square size", () => {
    const painter = new QrPainter({ data: "HELLO", version: 1, encoder: blankEncoder(21) });
    const surface = new RecordingSurface();
    painter.paint(surface, { width: 420, height: 210 });

    const [ring] = surface.finish({ width: 420, height: 210 }).commands;
    expect(ring).toEqual({
      op: "ring",
      bounds: { left: 0, top: 0, width: 60, height: 60 },
      strokeWidth: 10,
      color: { r: 0, g: 0, b: 0, a: 255 },
    });
  });

  it("grows modules by one pixel when gapless", () => {
    const painter = new QrPainter({ data: "HELLO", gapless: true, encoder: blankEncoder(21) });
    const [ring] = painter.toPicture(210).commands;
    expect(ring).toEqual({
      op: "ring",
      bounds: { left: 0, top: 0, width: 66, height: 66 },
      strokeWidth: 11,
      color: { r: 0, g: 0, b: 0, a: 255 },
    });
  });

  it("fills the background first when an empty color is set", () => {
    const painter = new QrPainter({ data: "HELLO", color: NAVY, emptyColor: WHITE });
    const { commands } = painter.toPicture(100);

    expect(commands[0]).toEqual({ op: "fillBackground", color: WHITE });
    expect(commands.filter((c) => c.op === "fillBackground")).toHaveLength(1);
    expect(commands.slice(1).every((c) => c.op !== "fillBackground" && c.color.b === 128)).toBe(true);
  });

  it("warns but still draws at zero size", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const painter = new QrPainter({ data: "HELLO", encoder: blankEncoder(21) });
    const surface = spySurface();

    painter.paint(surface, { width: 0, height: 300 });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(surface.drawRing).toHaveBeenCalledTimes(3);
  });

  describe("when encoding fails", () => {
    const tooLong = { data: "A".repeat(100), version: 1, errorCorrectionLevel: "H" as const };

    it("calls onError once with the failure", () => {
      const onError = vi.fn();
      const painter = new QrPainter({ ...tooLong, onError });

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toMatchObject({ kind: "DataTooLong" });
      expect(painter.hasFailed).toBe(true);
      expect(painter.state).toBe("failed");
      expect(painter.grid).toBeNull();
      expect(painter.moduleCount).toBe(0);
      expect(painter.symbolVersion).toBeNull();
    });

    it("draws nothing, not even the background", () => {
      const painter = new QrPainter({ ...tooLong, emptyColor: WHITE, onError: vi.fn() });
      const surface = spySurface();

      painter.paint(surface, { width: 210, height: 210 });
      painter.paint(surface, { width: 420, height: 420 });

      expect(surface.fillBackground).not.toHaveBeenCalled();
      expect(surface.drawFilledCircle).not.toHaveBeenCalled();
      expect(surface.drawRing).not.toHaveBeenCalled();
    });

    it("fails the same way without a callback", () => {
      const painter = new QrPainter({ ...tooLong, emptyColor: WHITE });

      expect(painter.hasFailed).toBe(true);
      expect(painter.failure?.kind).toBe("DataTooLong");
      expect(painter.toPicture(210).commands).toEqual([]);
    });

    it("exports a fully transparent image", async () => {
      const painter = new QrPainter(tooLong);
      const bytes = await painter.toImageData(4, "rawRgba");
      expect(Array.from(bytes)).toEqual(new Array<number>(4 * 4 * 4).fill(0));
    });
  });

  describe("shouldRepaint", () => {
    const base = { data: "HELLO", version: 1, errorCorrectionLevel: "L" as const };

    it("is false when nothing changed", () => {
      expect(new QrPainter(base).shouldRepaint(new QrPainter(base))).toBe(false);
    });

    it("ignores background and gapless changes", () => {
      const next = new QrPainter({ ...base, emptyColor: WHITE, gapless: true });
      expect(next.shouldRepaint(new QrPainter(base))).toBe(false);
    });

    it("is true when the color changes", () => {
      expect(new QrPainter({ ...base, color: NAVY }).shouldRepaint(new QrPainter(base))).toBe(true);
    });

    it("is true when the level changes", () => {
      expect(new QrPainter({ ...base, errorCorrectionLevel: "H" }).shouldRepaint(new QrPainter(base))).toBe(true);
    });

    it("is true when only the requested version changes", () => {
      // Auto selection also lands on version 1, so the grids match
      const auto = new QrPainter({ ...base, version: -1 });
      expect(gridsEqual(auto.grid, new QrPainter(base).grid)).toBe(true);
      expect(auto.shouldRepaint(new QrPainter(base))).toBe(true);
    });

    it("is true when the grid changes", () => {
      expect(new QrPainter({ ...base, data: "WORLD" }).shouldRepaint(new QrPainter(base))).toBe(true);
    });

    it("is false for anything that is not a painter", () => {
      expect(new QrPainter(base).shouldRepaint({ color: NAVY })).toBe(false);
      expect(new QrPainter(base).shouldRepaint(null)).toBe(false);
    });
  });

  describe("toImageData", () => {
    it("is byte-identical across calls", async () => {
      const painter = new QrPainter({ data: "HELLO", version: 1, emptyColor: WHITE });
      const first = await painter.toImageData(42);
      const second = await painter.toImageData(42);
      expect(Buffer.from(first).equals(Buffer.from(second))).toBe(true);
    });

    it("produces a PNG by default", async () => {
      const bytes = await new QrPainter({ data: "HELLO" }).toImageData(42);
      expect(Array.from(bytes.slice(0, 8))).toEqual([137, 80, 78, 71, 13, 10, 26, 10]);
    });

    it("produces size x size RGBA pixels in raw mode", async () => {
      const bytes = await new QrPainter({ data: "HELLO" }).toImageData(42.9, "rawRgba");
      expect(bytes.length).toBe(42 * 42 * 4);
    });

    it.each([NaN, Infinity])("rejects a %s size", async (size) => {
      await expect(new QrPainter({ data: "HELLO" }).toImageData(size)).rejects.toThrow(RangeError);
    });
  });
});

describe("createQrPainter", () => {
  it("encodes empty data", () => {
    const result = createQrPainter({ data: "", version: 1 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.painter.moduleCount).toBe(21);
  });

  it("returns a ready painter", () => {
    const result = createQrPainter({ data: "HELLO" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.painter.symbolVersion).toBe(1);
  });

  it("returns the failure instead of a painter", () => {
    const result = createQrPainter({ data: "HELLO", version: 99 });
    expect(result).toMatchObject({ ok: false, failure: { kind: "InvalidVersion" } });
  });
});

describe("gridsEqual", () => {
  it("compares cells", () => {
    expect(gridsEqual(createModuleGrid(1, [1]), createModuleGrid(1, [1]))).toBe(true);
    expect(gridsEqual(createModuleGrid(1, [1]), createModuleGrid(1, [0]))).toBe(false);
    expect(gridsEqual(createModuleGrid(1, [1]), null)).toBe(false);
    expect(gridsEqual(null, null)).toBe(true);
  });
});
