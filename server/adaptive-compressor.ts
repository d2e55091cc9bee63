/**
 * @fileoverview Size-targeted JPEG compression for memory-constrained displays.
 *
 * Two searches over an {@link ImageEncoder}:
 * - a coarse quality ladder, then a resolution ladder, then a best-effort
 *   encode that may exceed the budget;
 * - a fixed 7-probe bisection over quality that returns the highest fitting
 *   quality, or nothing.
 *
 * Both assume encoded size grows monotonically with quality, which holds for
 * quality-driven JPEG encoders and is not re-checked here.
 */

import type { RawImage } from './types.js';

/** Parameters for one encode attempt. */
export interface EncodeOptions {
  /** JPEG quality, 1-100. */
  quality: number;
  /** Resolution factor applied before encoding (1 = native). */
  scale: number;
  /** Convert to grayscale before encoding. */
  grayscale?: boolean;
}

/**
 * Encodes raw images. Implementations return null when the encoder produced
 * no output; they never return empty or partial bytes.
 */
export interface ImageEncoder {
  encode(image: RawImage, options: EncodeOptions): Promise<Buffer | null>;
}

/** Compressed bytes plus the settings that produced them. */
export interface CompressionResult {
  data: Buffer;
  quality: number;
  scale: number;
  /** False only for the coarse search's best-effort fallback. */
  withinBudget: boolean;
  /** Encoder calls made by the search, including failed ones. */
  attempts: number;
}

/** Running encoder statistics. */
export interface CompressionStats {
  totalCompressions: number;
  totalBytesIn: number;
  totalBytesOut: number;
  /** Exponentially weighted output/input size ratio. */
  avgCompressionRatio: number;
  /** Exponentially weighted encode time in milliseconds. */
  avgProcessingTimeMs: number;
}

/** Thrown when the encoder cannot produce any output at all. */
export class EncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

export const QUALITY_LADDER = [85, 75, 65, 55, 45, 35, 25] as const;
export const SCALE_LADDER = [0.8, 0.6, 0.4] as const;
/** Quality used for the resolution ladder and the best-effort fallback. */
export const FALLBACK_QUALITY = 25;
export const QUALITY_SEARCH_MIN = 10;
export const QUALITY_SEARCH_MAX = 95;
/** Bisection probes; the iteration count is the stopping condition. */
export const QUALITY_SEARCH_ITERATIONS = 7;

/** Weight kept by the running averages on each update. */
const STATS_DECAY = 0.9;

const log = (msg: string) => {
  console.log(msg);
};

function emptyStats(): CompressionStats {
  return {
    totalCompressions: 0,
    totalBytesIn: 0,
    totalBytesOut: 0,
    avgCompressionRatio: 0,
    avgProcessingTimeMs: 0,
  };
}

function weighted(previous: number, sample: number): number {
  return previous === 0 ? sample : previous * STATS_DECAY + sample * (1 - STATS_DECAY);
}

/**
 * Searches quality and resolution to fit a compressed image into a byte budget.
 */
export class AdaptiveCompressor {
  private stats: CompressionStats = emptyStats();

  constructor(private readonly encoder: ImageEncoder) {}

  /**
   * Coarse ladder search. Always returns bytes: when nothing fits, the native
   * resolution at quality 25 is returned with `withinBudget: false`.
   *
   * @param budgetBytes - Maximum acceptable output size.
   * @throws EncodingError if even the fallback encode produces nothing.
   */
  async compressForBudget(image: RawImage, budgetBytes: number): Promise<CompressionResult> {
    let attempts = 0;

    for (const quality of QUALITY_LADDER) {
      attempts++;
      const data = await this.tryEncode(image, { quality, scale: 1 });
      if (data && data.length <= budgetBytes) {
        log(`[Compressor] Budget compression: ${data.length} bytes at quality ${quality}`);
        return { data, quality, scale: 1, withinBudget: true, attempts };
      }
    }

    for (const scale of SCALE_LADDER) {
      attempts++;
      const data = await this.tryEncode(image, { quality: FALLBACK_QUALITY, scale });
      if (data && data.length <= budgetBytes) {
        log(`[Compressor] Budget compression: ${data.length} bytes at scale ${scale}`);
        return { data, quality: FALLBACK_QUALITY, scale, withinBudget: true, attempts };
      }
    }

    console.warn(`[Compressor] Could not reach ${budgetBytes} bytes, returning best effort`);
    attempts++;
    const data = await this.tryEncode(image, { quality: FALLBACK_QUALITY, scale: 1 });
    if (!data) {
      throw new EncodingError(`Encoder produced no output for a ${image.width}x${image.height} image`);
    }
    return { data, quality: FALLBACK_QUALITY, scale: 1, withinBudget: data.length <= budgetBytes, attempts };
  }

  /**
   * Bisection search for the highest quality in [10, 95] whose output fits.
   * A failed encode counts as too large.
   *
   * @returns The best fitting result, or null when no probe fit.
   * @throws EncodingError if no probe produced any output at all.
   */
  async optimalQualityForBudget(image: RawImage, budgetBytes: number): Promise<CompressionResult | null> {
    let low = QUALITY_SEARCH_MIN;
    let high = QUALITY_SEARCH_MAX;
    let best: { data: Buffer; quality: number } | null = null;
    let encodedAny = false;

    for (let i = 0; i < QUALITY_SEARCH_ITERATIONS; i++) {
      const mid = Math.floor((low + high) / 2);
      const data = await this.tryEncode(image, { quality: mid, scale: 1 });

      if (!data) {
        high = mid - 1;
        continue;
      }
      encodedAny = true;

      if (data.length <= budgetBytes) {
        best = { data, quality: mid };
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }

    if (!encodedAny) {
      throw new EncodingError(`Encoder produced no output in ${QUALITY_SEARCH_ITERATIONS} probes`);
    }
    if (!best) {
      return null;
    }

    log(`[Compressor] Adaptive compression: ${best.data.length} bytes at quality ${best.quality}`);
    return {
      data: best.data,
      quality: best.quality,
      scale: 1,
      withinBudget: true,
      attempts: QUALITY_SEARCH_ITERATIONS,
    };
  }

  /**
   * Encodes a preview that fits inside `maxWidth` x `maxHeight`, keeping the
   * aspect ratio. Images already small enough are encoded at native size.
   */
  async createThumbnail(
    image: RawImage,
    options: { maxWidth?: number; maxHeight?: number; quality?: number } = {}
  ): Promise<Buffer | null> {
    const { maxWidth = 160, maxHeight = 120, quality = 75 } = options;
    const scale = Math.min(maxWidth / image.width, maxHeight / image.height);
    return this.tryEncode(image, { quality, scale: scale < 1 ? scale : 1 });
  }

  /** Returns a snapshot of the running statistics. */
  getStats(): CompressionStats & { overallCompressionRatio: number } {
    const overall = this.stats.totalBytesIn > 0
      ? this.stats.totalBytesOut / this.stats.totalBytesIn
      : 0;
    return { ...this.stats, overallCompressionRatio: overall };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  private async tryEncode(image: RawImage, options: EncodeOptions): Promise<Buffer | null> {
    const start = performance.now();
    let data: Buffer | null;
    try {
      data = await this.encoder.encode(image, options);
    } catch (error) {
      console.error(`[Compressor] Encode failed at quality ${options.quality}, scale ${options.scale}:`, error);
      return null;
    }
    if (!data || data.length === 0) {
      return null;
    }
    this.recordStats(image.data.length, data.length, performance.now() - start);
    return data;
  }

  private recordStats(bytesIn: number, bytesOut: number, elapsedMs: number): void {
    this.stats.totalCompressions++;
    this.stats.totalBytesIn += bytesIn;
    this.stats.totalBytesOut += bytesOut;
    this.stats.avgCompressionRatio = weighted(this.stats.avgCompressionRatio, bytesOut / Math.max(1, bytesIn));
    this.stats.avgProcessingTimeMs = weighted(this.stats.avgProcessingTimeMs, elapsedMs);
  }
}
