/**
 * @fileoverview JPEG encoding and decoding backed by Jimp.
 */

import { Jimp, JimpMime } from 'jimp';
import type { EncodeOptions, ImageEncoder } from './adaptive-compressor.js';
import type { RawImage } from './types.js';

type JimpImage = ReturnType<typeof Jimp.fromBitmap>;

/** Copies a raw RGBA image into Jimp; in-place filters never touch the source. */
export function toJimp(image: RawImage): JimpImage {
  // fromBitmap reads data.buffer from offset 0, so the copy must own its
  // whole ArrayBuffer; Buffer.from may hand back a slice of the shared pool.
  const data = Buffer.alloc(image.data.length);
  data.set(image.data);
  return Jimp.fromBitmap({
    width: image.width,
    height: image.height,
    data,
  });
}

/** Converts a Jimp bitmap back to the service's raw image shape. */
export function fromJimp(image: JimpImage): RawImage {
  const { width, height, data } = image.bitmap;
  return { width, height, data: new Uint8Array(data) };
}

/**
 * Decodes JPEG bytes to RGBA.
 *
 * @throws If the bytes are not a decodable image.
 */
export async function decodeJpeg(bytes: Buffer): Promise<RawImage> {
  const image = await Jimp.read(bytes);
  return fromJimp(image);
}

/** Dimensions for a scale factor, never below one pixel. */
export function scaledSize(width: number, height: number, scale: number): { w: number; h: number } {
  return {
    w: Math.max(1, Math.floor(width * scale)),
    h: Math.max(1, Math.floor(height * scale)),
  };
}

/**
 * {@link ImageEncoder} on top of Jimp's JPEG codec.
 *
 * Failures are logged and reported as null so the compressor can treat them
 * as an oversized probe.
 */
export class JimpImageEncoder implements ImageEncoder {
  async encode(image: RawImage, options: EncodeOptions): Promise<Buffer | null> {
    try {
      const jimp = toJimp(image);
      if (options.scale !== 1) {
        jimp.resize(scaledSize(image.width, image.height, options.scale));
      }
      if (options.grayscale) {
        jimp.greyscale();
      }
      const data = await jimp.getBuffer(JimpMime.jpeg, { quality: options.quality });
      return data.length > 0 ? data : null;
    } catch (error) {
      console.error(`[JimpEncoder] JPEG encode failed (${image.width}x${image.height}, q${options.quality}):`, error);
      return null;
    }
  }
}
