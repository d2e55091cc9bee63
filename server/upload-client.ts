/**
 * @fileoverview Periodic capture-and-upload client for an HTTP ingest API.
 *
 * Capturing and uploading are decoupled: a capture loop ticks at a fixed
 * interval and enqueues JPEGs, and a small pool of workers POSTs them. A
 * slow or unreachable API therefore never delays the next capture; once the
 * bounded queue is full, new captures are dropped.
 */

import { BoundedFrameQueue, DEFAULT_QUEUE_CAPACITY } from './frame-queue.js';
import { framesDroppedTotal, uploadDuration, uploadsTotal } from './telemetry.js';

const log = (msg: string) => {
  console.log(msg);
};

export interface UploadJob {
  data: Buffer;
  filename: string;
  capturedAt: Date;
}

export type UploadResult = 'ok' | 'http_error' | 'timeout' | 'network_error';

export interface UploadStats {
  captured: number;
  captureFailures: number;
  dropped: number;
  uploaded: number;
  failed: number;
  pending: number;
}

export interface CaptureUploadOptions {
  url: string;
  /** Produces one JPEG; null skips this tick. */
  capture: () => Promise<Buffer | null>;
  intervalMs?: number;
  workers?: number;
  timeoutMs?: number;
  queueCapacity?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `camera_image_YYYY-MM-DD_at_HH.MM.SS.jpg` in local time. */
export function formatCaptureFilename(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}.${pad(date.getMinutes())}.${pad(date.getSeconds())}`;
  return `camera_image_${day}_at_${time}.jpg`;
}

export class CaptureUploadClient {
  private readonly queue: BoundedFrameQueue<UploadJob>;
  private readonly intervalMs: number;
  private readonly workerCount: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private running = false;
  private loop: Promise<void> = Promise.resolve();
  private workers: Promise<void>[] = [];
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;
  private readonly stats = { captured: 0, captureFailures: 0, uploaded: 0, failed: 0 };

  constructor(private readonly options: CaptureUploadOptions) {
    this.intervalMs = options.intervalMs ?? 500;
    this.workerCount = options.workers ?? 2;
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.queue = new BoundedFrameQueue<UploadJob>(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
  }

  get isRunning(): boolean {
    return this.running;
  }

  getStats(): UploadStats {
    return {
      ...this.stats,
      dropped: this.queue.droppedCount,
      pending: this.queue.size,
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    log(`[Upload] Capturing every ${this.intervalMs}ms, ${this.workerCount} upload worker(s) -> ${this.options.url}`);

    this.loop = this.captureLoop();
    this.workers = Array.from({ length: this.workerCount }, (_, i) => this.worker(i + 1));
  }

  /** Stops capturing, then waits for workers to upload what is already queued. */
  async stop(): Promise<UploadStats> {
    if (this.running) {
      this.running = false;
      if (this.sleepTimer) clearTimeout(this.sleepTimer);
      this.wake?.();
    }
    await this.loop;
    this.queue.close();
    await Promise.all(this.workers);

    const stats = this.getStats();
    log(`[Upload] Stopped: ${stats.captured} captured, ${stats.uploaded} uploaded, ${stats.failed} failed, ${stats.dropped} dropped`);
    return stats;
  }

  /**
   * POSTs one image as multipart field `image`.
   *
   * @returns The outcome; never throws.
   */
  async upload(job: UploadJob): Promise<UploadResult> {
    const form = new FormData();
    form.append('image', new Blob([job.data], { type: 'image/jpeg' }), job.filename);

    const endTimer = uploadDuration.startTimer();
    let result: UploadResult;
    try {
      const response = await this.fetchImpl(this.options.url, {
        method: 'POST',
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (response.ok) {
        result = 'ok';
        log(`[Upload] Sent ${job.filename} (${job.data.length} bytes)`);
      } else {
        const body = await response.text();
        result = 'http_error';
        console.warn(`[Upload] Failed to send ${job.filename}: HTTP ${response.status} ${body.slice(0, 100)}`);
      }
    } catch (error) {
      const name = error instanceof Error ? error.name : '';
      result = name === 'TimeoutError' || name === 'AbortError' ? 'timeout' : 'network_error';
      console.warn(`[Upload] ${result === 'timeout' ? 'Timeout' : 'Connection error'} sending ${job.filename}: ${error instanceof Error ? error.message : error}`);
    } finally {
      endTimer();
    }

    uploadsTotal.inc({ result });
    if (result === 'ok') this.stats.uploaded++;
    else this.stats.failed++;
    return result;
  }

  private async captureLoop(): Promise<void> {
    let next = Date.now();
    while (this.running) {
      await this.captureOnce();

      next += this.intervalMs;
      const now = Date.now();
      if (next < now) {
        // Fell behind; skip missed ticks instead of bursting
        next = now;
      }
      await this.sleep(next - now);
    }
  }

  private async captureOnce(): Promise<void> {
    let data: Buffer | null;
    try {
      data = await this.options.capture();
    } catch (error) {
      console.error('[Upload] Capture error:', error);
      data = null;
    }
    if (!data) {
      this.stats.captureFailures++;
      return;
    }

    const capturedAt = this.now();
    this.stats.captured++;
    const accepted = this.queue.enqueue({ data, filename: formatCaptureFilename(capturedAt), capturedAt });
    if (!accepted) {
      framesDroppedTotal.inc({ queue: 'upload' });
      console.warn(`[Upload] Upload backlog full, dropped capture ${this.stats.captured}`);
    }
  }

  private async worker(id: number): Promise<void> {
    while (true) {
      const next = await this.queue.dequeue(1_000);
      if (next.status === 'closed') break;
      if (next.status === 'timeout') continue;
      await this.upload(next.item);
    }
    log(`[Upload] Worker ${id} finished`);
  }

  private sleep(ms: number): Promise<void> {
    if (!this.running || ms <= 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = null;
        this.sleepTimer = null;
        resolve();
      };
      this.sleepTimer = setTimeout(this.wake, ms);
    });
  }
}
