/**
 * @fileoverview Shared image types passed between frame sources, encoders
 * and the device bitmap transform.
 */

/** An uncompressed RGBA image, 4 bytes per pixel, row-major. */
export interface RawImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/** A complete JPEG image, SOI through EOI inclusive. */
export type Frame = Buffer;
