/**
 * @fileoverview 1-bit-per-pixel bitmaps for monochrome microcontroller displays.
 *
 * Layout: row-major, most significant bit first, 8 pixels per byte. Each row
 * is padded to a whole byte, so a frame is `ceil(width / 8) * height` bytes.
 * A set bit is a white pixel.
 */

import { toJimp } from './jimp-encoder.js';
import type { RawImage } from './types.js';

/** Luminance above this value becomes white. */
export const DEFAULT_THRESHOLD = 128;

/** Bytes needed for one packed frame. */
export function bitmapSize(width: number, height: number): number {
  return Math.ceil(width / 8) * height;
}

/**
 * Thresholds an 8-bit grayscale buffer and packs it.
 *
 * @param gray - One byte per pixel, `width * height` long.
 */
export function packBitmap(gray: Uint8Array, width: number, height: number, threshold = DEFAULT_THRESHOLD): Buffer {
  if (gray.length < width * height) {
    throw new RangeError(`Expected ${width * height} grayscale bytes, got ${gray.length}`);
  }

  const rowBytes = Math.ceil(width / 8);
  const out = Buffer.alloc(rowBytes * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (gray[y * width + x] > threshold) {
        out[y * rowBytes + (x >> 3)] |= 0x80 >> (x & 7);
      }
    }
  }
  return out;
}

/** Expands a packed bitmap back to one byte per pixel (0 or 255). */
export function unpackBitmap(bits: Uint8Array, width: number, height: number): Uint8Array {
  const rowBytes = Math.ceil(width / 8);
  const gray = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const set = bits[y * rowBytes + (x >> 3)] & (0x80 >> (x & 7));
      gray[y * width + x] = set ? 255 : 0;
    }
  }
  return gray;
}

/**
 * Grayscales, resizes to exactly `width` x `height` (aspect ratio is not
 * kept) and packs an RGBA image for the display.
 */
export function toDeviceBitmap(image: RawImage, width: number, height: number, threshold = DEFAULT_THRESHOLD): Buffer {
  const jimp = toJimp(image);
  jimp.greyscale();
  if (image.width !== width || image.height !== height) {
    jimp.resize({ w: width, h: height });
  }

  const rgba = jimp.bitmap.data;
  const gray = new Uint8Array(width * height);
  for (let i = 0; i < gray.length; i++) {
    gray[i] = rgba[i * 4];
  }
  return packBitmap(gray, width, height, threshold);
}
