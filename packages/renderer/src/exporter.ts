/**
 * Image export - rasterize a recorded picture and serialize the pixels
 */

import pngjs from "pngjs";
import type { Frame } from "@qr-eyes/core";
import type { Picture } from "./picture.js";

const { PNG } = pngjs;

/** Output byte formats */
export type ImageByteFormat = "rawRgba" | "png";

/**
 * Serialize a frame. Raw output is a copy of the frame's RGBA bytes.
 */
export function encodeFrame(frame: Frame, format: ImageByteFormat): Promise<Uint8Array> {
  if (format === "rawRgba") {
    return Promise.resolve(Uint8Array.from(frame.pixels));
  }
  return encodePng(frame);
}

/**
 * Stream a frame through pngjs and collect the encoded bytes
 */
export function encodePng(frame: Frame): Promise<Uint8Array> {
  if (frame.width < 1 || frame.height < 1) {
    return Promise.reject(
      new RangeError(`Cannot encode a ${frame.width}x${frame.height} image as PNG`)
    );
  }

  const png = new PNG({ width: frame.width, height: frame.height });
  png.data = Buffer.from(frame.pixels);

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    png
      .pack()
      .on("data", (chunk: Buffer) => chunks.push(chunk))
      .on("end", () => resolve(new Uint8Array(Buffer.concat(chunks))))
      .on("error", reject);
  });
}

/**
 * Rasterize a picture at its recorded size and encode it
 */
export function exportPicture(
  picture: Picture,
  format: ImageByteFormat = "png"
): Promise<Uint8Array> {
  const { width, height } = picture.size;
  if (!Number.isFinite(width) || !Number.isFinite(height)) {
    return Promise.reject(new RangeError(`Image size must be finite, got ${width}x${height}`));
  }
  return encodeFrame(picture.toImage(), format);
}
