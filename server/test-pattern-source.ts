/**
 * @fileoverview Synthetic frame source for running without camera hardware.
 *
 * Produces a diagonal gradient that shifts a few pixels per capture, so
 * streams visibly move and consecutive JPEGs differ.
 */

import type { FrameSource } from './camera.js';
import type { RawImage } from './types.js';

export class TestPatternSource implements FrameSource {
  readonly name = 'test-pattern';
  private active = false;
  private frameIndex = 0;

  constructor(private readonly width = 320, private readonly height = 240) {}

  get isActive(): boolean {
    return this.active;
  }

  get resolution(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  async start(): Promise<void> {
    this.active = true;
  }

  async capture(): Promise<RawImage | null> {
    if (!this.active) return null;
    return renderTestPattern(this.width, this.height, this.frameIndex++);
  }

  async stop(): Promise<void> {
    this.active = false;
  }
}

/** Renders frame `index` of the moving gradient as opaque RGBA. */
export function renderTestPattern(width: number, height: number, index: number): RawImage {
  const data = new Uint8Array(width * height * 4);
  const offset = index * 4;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      data[i] = (x + offset) & 0xff;
      data[i + 1] = (y + offset) & 0xff;
      data[i + 2] = ((x + y) >> 1) & 0xff;
      data[i + 3] = 0xff;
    }
  }
  return { width, height, data };
}
