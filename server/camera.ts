/**
 * @fileoverview Exclusive camera ownership and frame encoding.
 *
 * The camera is a shared exclusive resource: HTTP handlers, stream loops and
 * the display protocol all capture through one {@link CameraService}, which
 * serializes every capture-transform-encode cycle.
 */

import type { AdaptiveCompressor, ImageEncoder } from './adaptive-compressor.js';
import { toDeviceBitmap } from './bitmap.js';
import { captureDuration, capturesTotal, compressionOutputBytes } from './telemetry.js';
import type { RawImage } from './types.js';

const log = (msg: string) => {
  console.log(msg);
};

/** A device (or stand-in) that yields raw frames. */
export interface FrameSource {
  /** Short identifier for logs and /info. */
  readonly name: string;
  readonly isActive: boolean;
  /** Native frame size once known. */
  readonly resolution: { width: number; height: number } | null;
  start(): Promise<void>;
  /** Latest frame, or null when none is available yet. */
  capture(): Promise<RawImage | null>;
  stop(): Promise<void>;
}

/** How `captureCompressedJpeg` is produced, fixed at construction. */
export type CompressionCapability =
  | { kind: 'adaptive'; compressor: AdaptiveCompressor; budgetBytes: number }
  | { kind: 'basic'; quality: number };

export type BitmapTransform = (image: RawImage, width: number, height: number) => Buffer;

export type CaptureKind = 'color' | 'grayscale' | 'compressed' | 'thumbnail' | 'bitmap';

export interface CameraServiceOptions {
  encoder: ImageEncoder;
  compression: CompressionCapability;
  defaultQuality?: number;
  grayscaleQuality?: number;
  toBitmap?: BitmapTransform;
}

export interface CameraStatus {
  camera_active: boolean;
  source: string;
  resolution: string;
  format: 'JPEG';
  grayscale_processing: boolean;
  advanced_compression: boolean;
  face_detection: boolean;
  compressed_budget_bytes: number | null;
  captures: number;
  last_capture_at: string | null;
}

/** Raised inside a capture cycle when no frame can be produced. */
export class CaptureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CaptureError';
  }
}

/** FIFO mutual exclusion over async sections. */
class CaptureLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Owns a {@link FrameSource} and turns its frames into JPEGs and bitmaps.
 *
 * Capture methods never throw: any failure is logged and reported as null.
 */
export class CameraService {
  private readonly lock = new CaptureLock();
  private readonly encoder: ImageEncoder;
  private readonly compression: CompressionCapability;
  private readonly defaultQuality: number;
  private readonly grayscaleQuality: number;
  private readonly toBitmap: BitmapTransform;
  private captures = 0;
  private lastCaptureAt: Date | null = null;

  constructor(private readonly source: FrameSource, options: CameraServiceOptions) {
    this.encoder = options.encoder;
    this.compression = options.compression;
    this.defaultQuality = options.defaultQuality ?? 85;
    this.grayscaleQuality = options.grayscaleQuality ?? 80;
    this.toBitmap = options.toBitmap ?? toDeviceBitmap;
  }

  get isActive(): boolean {
    return this.source.isActive;
  }

  async start(): Promise<void> {
    log(`[Camera] Starting ${this.source.name} source`);
    await this.source.start();
    log(`[Camera] ${this.source.name} source ready (compression: ${this.compression.kind})`);
  }

  async stop(): Promise<void> {
    await this.source.stop();
    log(`[Camera] ${this.source.name} source stopped`);
  }

  /** Color JPEG at the default quality. */
  captureJpeg(): Promise<Buffer | null> {
    return this.capture('color', (image) =>
      this.encoder.encode(image, { quality: this.defaultQuality, scale: 1 })
    );
  }

  captureGrayscaleJpeg(): Promise<Buffer | null> {
    return this.capture('grayscale', (image) =>
      this.encoder.encode(image, { quality: this.grayscaleQuality, scale: 1, grayscale: true })
    );
  }

  /**
   * JPEG sized for memory-constrained clients. With the adaptive capability
   * this is the ladder search against the byte budget; the result may still
   * exceed the budget when nothing smaller could be produced.
   */
  captureCompressedJpeg(): Promise<Buffer | null> {
    const compression = this.compression;
    if (compression.kind === 'basic') {
      return this.capture('compressed', (image) =>
        this.encoder.encode(image, { quality: compression.quality, scale: 1 })
      );
    }
    return this.capture('compressed', async (image) => {
      const result = await compression.compressor.compressForBudget(image, compression.budgetBytes);
      compressionOutputBytes.observe({ algorithm: 'ladder' }, result.data.length);
      if (!result.withinBudget) {
        console.warn(`[Camera] Compressed frame is ${result.data.length} bytes, over the ${compression.budgetBytes} byte budget`);
      }
      return result.data;
    });
  }

  /** Small preview, available only with the adaptive capability. */
  captureThumbnail(): Promise<Buffer | null> {
    const compression = this.compression;
    if (compression.kind !== 'adaptive') return Promise.resolve(null);
    return this.capture('thumbnail', (image) => compression.compressor.createThumbnail(image));
  }

  /** Packed 1bpp frame for a `width` x `height` display. */
  captureDeviceBitmap(width: number, height: number): Promise<Buffer | null> {
    return this.capture('bitmap', async (image) => {
      const bitmap = this.toBitmap(image, width, height);
      log(`[Camera] Created bitmap: ${bitmap.length} bytes for ${width}x${height} display`);
      return bitmap;
    });
  }

  getStatus(): CameraStatus {
    const res = this.source.resolution;
    return {
      camera_active: this.source.isActive,
      source: this.source.name,
      resolution: res ? `${res.width}x${res.height}` : 'unknown',
      format: 'JPEG',
      grayscale_processing: true,
      advanced_compression: this.compression.kind === 'adaptive',
      face_detection: false,
      compressed_budget_bytes: this.compression.kind === 'adaptive' ? this.compression.budgetBytes : null,
      captures: this.captures,
      last_capture_at: this.lastCaptureAt ? this.lastCaptureAt.toISOString() : null,
    };
  }

  /** Compression statistics when the adaptive capability is present. */
  getCompressionStats(): ReturnType<AdaptiveCompressor['getStats']> | null {
    return this.compression.kind === 'adaptive' ? this.compression.compressor.getStats() : null;
  }

  private async capture(kind: CaptureKind, produce: (image: RawImage) => Promise<Buffer | null>): Promise<Buffer | null> {
    const endTimer = captureDuration.startTimer({ kind });
    try {
      const output = await this.lock.run(async () => {
        if (!this.source.isActive) {
          throw new CaptureError(`${this.source.name} source is not running`);
        }
        const image = await this.source.capture();
        if (!image) {
          throw new CaptureError(`${this.source.name} source has no frame yet`);
        }
        return produce(image);
      });

      if (!output) {
        console.error(`[Camera] ${kind} encoding produced no output`);
        capturesTotal.inc({ kind, result: 'encode_failed' });
        return null;
      }

      this.captures++;
      this.lastCaptureAt = new Date();
      capturesTotal.inc({ kind, result: 'ok' });
      return output;
    } catch (error) {
      console.error(`[Camera] ${kind} capture error:`, error instanceof Error ? error.message : error);
      capturesTotal.inc({ kind, result: 'error' });
      return null;
    } finally {
      endTimer();
    }
  }
}
