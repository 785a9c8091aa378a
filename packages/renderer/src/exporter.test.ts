import { describe, it, expect } from "vitest";
import pngjs from "pngjs";
import { createSolidFrame, setPixel } from "@qr-eyes/core";
import { encodeFrame, encodePng, exportPicture } from "./exporter.js";
import { RecordingSurface } from "./picture.js";

const { PNG } = pngjs;

describe("encodeFrame", () => {
  it("returns a copy of the pixels for raw output", async () => {
    const frame = createSolidFrame(2, 1, { r: 1, g: 2, b: 3, a: 4 });
    const bytes = await encodeFrame(frame, "rawRgba");

    expect(Array.from(bytes)).toEqual([1, 2, 3, 4, 1, 2, 3, 4]);
    expect(bytes).not.toBe(frame.pixels);
  });

  it("writes a PNG that decodes to the same pixels", async () => {
    const frame = createSolidFrame(3, 2, { r: 255, g: 255, b: 255, a: 255 });
    setPixel(frame, 1, 1, { r: 10, g: 20, b: 30, a: 255 });

    const png = PNG.sync.read(Buffer.from(await encodeFrame(frame, "png")));
    expect(png.width).toBe(3);
    expect(png.height).toBe(2);
    expect(Array.from(png.data)).toEqual(Array.from(frame.pixels));
  });
});

describe("encodePng", () => {
  it("rejects empty images", async () => {
    await expect(encodePng(createSolidFrame(0, 0))).rejects.toThrow(RangeError);
  });
});

describe("exportPicture", () => {
  it("truncates fractional sizes", async () => {
    const picture = new RecordingSurface().finish({ width: 5.7, height: 5.7 });
    const bytes = await exportPicture(picture, "rawRgba");
    expect(bytes.length).toBe(5 * 5 * 4);
  });

  it.each([NaN, Infinity])("rejects a %s size instead of throwing", async (size) => {
    const picture = new RecordingSurface().finish({ width: size, height: size });
    const pending = exportPicture(picture);
    await expect(pending).rejects.toThrow(RangeError);
    await expect(pending).rejects.toThrow(`Image size must be finite, got ${size}x${size}`);
  });
});
