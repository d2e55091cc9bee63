/**
 * @fileoverview Tests for 1bpp bitmap packing and the display transform.
 */

import { describe, test, expect } from 'vitest';
import { bitmapSize, packBitmap, toDeviceBitmap, unpackBitmap } from '../../server/bitmap.js';
import type { RawImage } from '../../server/types.js';
import { solidImage } from './test-utils.js';

describe('packBitmap', () => {
  test('packs most significant bit first', () => {
    const gray = Uint8Array.from([0, 255, 0, 255, 0, 255, 0, 255]);
    expect([...packBitmap(gray, 8, 1)]).toEqual([0x55]);
  });

  test('pads each row to a whole byte', () => {
    const gray = new Uint8Array(20);
    gray.fill(200, 0, 10);

    expect([...packBitmap(gray, 10, 2)]).toEqual([0xff, 0xc0, 0x00, 0x00]);
  });

  test('treats only values above the threshold as white', () => {
    const gray = Uint8Array.from([127, 128, 129, 255, 0, 0, 0, 0]);
    expect([...packBitmap(gray, 8, 1)]).toEqual([0b00110000]);
  });

  test('honours a custom threshold', () => {
    const gray = Uint8Array.from([10, 20, 30, 40, 50, 60, 70, 80]);
    expect([...packBitmap(gray, 8, 1, 45)]).toEqual([0b00001111]);
  });

  test('rejects a short grayscale buffer', () => {
    expect(() => packBitmap(new Uint8Array(3), 2, 2)).toThrow(RangeError);
  });
});

describe('bitmapSize', () => {
  test('is width/8 times height for the default display', () => {
    expect(bitmapSize(240, 320)).toBe(9600);
  });

  test('rounds partial bytes up per row', () => {
    expect(bitmapSize(10, 3)).toBe(6);
  });
});

describe('unpackBitmap', () => {
  test('restores thresholded pixels', () => {
    const gray = Uint8Array.from([
      0, 255, 255, 0, 0, 0, 0, 0, 255, 0,
      255, 0, 0, 0, 0, 0, 0, 0, 0, 255,
    ]);
    const packed = packBitmap(gray, 10, 2);
    expect([...unpackBitmap(packed, 10, 2)]).toEqual([...gray]);
  });
});

describe('toDeviceBitmap', () => {
  test('produces a full-size frame for the display', () => {
    const bitmap = toDeviceBitmap(solidImage(320, 240, 255), 240, 320);
    expect(bitmap.length).toBe(9600);
    expect(bitmap.every(byte => byte === 0xff)).toBe(true);
  });

  test('maps dark images to all-zero bits', () => {
    const bitmap = toDeviceBitmap(solidImage(16, 4, 20), 16, 4);
    expect([...bitmap]).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  test('keeps the left-to-right pixel order', () => {
    const width = 16;
    const height = 2;
    const data = new Uint8Array(width * height * 4);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const i = (y * width + x) * 4;
        const v = x < 8 ? 230 : 10;
        data[i] = v;
        data[i + 1] = v;
        data[i + 2] = v;
        data[i + 3] = 255;
      }
    }
    const image: RawImage = { width, height, data };

    expect([...toDeviceBitmap(image, width, height)]).toEqual([0xff, 0x00, 0xff, 0x00]);
  });

  test('converts frames smaller than a kilopixel', () => {
    expect([...toDeviceBitmap(solidImage(16, 2, 230), 16, 2)]).toEqual([0xff, 0xff, 0xff, 0xff]);
  });
});
