/**
 * @fileoverview Splits an unframed MJPEG byte stream into complete JPEG frames.
 *
 * Frames are delimited only by the SOI (0xFFD8) and EOI (0xFFD9) markers.
 * Chunks may carry zero, one or many frames, and a frame may span any number
 * of chunks. Entropy-coded JPEG data stuffs every 0xFF with 0x00, so a
 * correctly encoded payload never contains a false marker; no other framing
 * is attempted.
 */

import type { Frame } from './types.js';

/** JPEG Start Of Image marker. */
export const SOI_MARKER = Buffer.from([0xff, 0xd8]);
/** JPEG End Of Image marker. */
export const EOI_MARKER = Buffer.from([0xff, 0xd9]);

/**
 * Accumulates transport chunks and emits every complete frame found in them.
 *
 * The accumulator only ever shrinks up to the end of the last emitted frame,
 * so a partially received frame is kept across `feed` calls.
 */
export class FrameDemuxer {
  private buffer: Buffer = Buffer.alloc(0);
  private emitted = 0;

  /** Bytes currently held waiting for a frame to complete. */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /** Total frames emitted since construction. */
  get framesEmitted(): number {
    return this.emitted;
  }

  /**
   * Appends a chunk and returns the frames it completed, in arrival order.
   *
   * @param chunk - Raw bytes as read from the transport.
   * @returns Copies of each complete frame, markers included.
   */
  feed(chunk: Uint8Array): Frame[] {
    this.buffer = this.buffer.length === 0
      ? Buffer.from(chunk)
      : Buffer.concat([this.buffer, chunk]);

    const frames: Frame[] = [];
    let searchPos = 0;
    let consumedTo = 0;

    while (searchPos < this.buffer.length) {
      const start = this.buffer.indexOf(SOI_MARKER, searchPos);
      if (start === -1) break;

      // EOI must begin after the two SOI bytes
      const end = this.buffer.indexOf(EOI_MARKER, start + 2);
      if (end === -1) break;

      const frameEnd = end + 2;
      frames.push(Buffer.from(this.buffer.subarray(start, frameEnd)));
      searchPos = frameEnd;
      consumedTo = frameEnd;
    }

    if (consumedTo > 0) {
      this.buffer = this.buffer.subarray(consumedTo);
    }

    this.emitted += frames.length;
    return frames;
  }

  /**
   * Signals that the transport closed. Any unterminated frame is discarded.
   *
   * @returns Number of bytes that were dropped.
   */
  end(): number {
    const discarded = this.buffer.length;
    this.buffer = Buffer.alloc(0);
    return discarded;
  }
}

/**
 * Parses JPEG dimensions from the first SOF0 (0xFFC0) or SOF2 (0xFFC2) segment.
 *
 * SOF layout: FF C0 LL LL PP HH HH WW WW, where HH HH is the height and
 * WW WW the width, both big-endian.
 */
export function parseJpegDimensions(data: Uint8Array): { width: number; height: number } | null {
  for (let i = 0; i < data.length - 8; i++) {
    if (data[i] === 0xff && (data[i + 1] === 0xc0 || data[i + 1] === 0xc2)) {
      const height = (data[i + 5] << 8) | data[i + 6];
      const width = (data[i + 7] << 8) | data[i + 8];
      return { width, height };
    }
  }
  return null;
}
