/**
 * @fileoverview Client for raw MJPEG-over-TCP streams.
 *
 * A receiver task splits the socket byte stream into frames and pushes them
 * into a {@link BoundedFrameQueue}; a consumer task drains the queue into a
 * file, individual JPEGs, or just a counter. When the queue is full the new
 * frame is dropped, so a slow disk never stalls the socket.
 */

import { open, writeFile } from 'fs/promises';
import { createConnection, type Socket } from 'net';
import { join } from 'path';
import type { StreamClientMode } from './config.js';
import { FrameDemuxer } from './frame-demuxer.js';
import { BoundedFrameQueue, DEFAULT_QUEUE_CAPACITY } from './frame-queue.js';
import { framesDemuxedTotal, framesDroppedTotal } from './telemetry.js';
import type { Frame } from './types.js';

const log = (msg: string) => {
  console.log(msg);
};

export interface StreamClientOptions {
  host: string;
  port: number;
  mode: StreamClientMode;
  /** Recording path in `save` mode; defaults to a timestamped name in `outputDir`. */
  output?: string;
  /** Directory for `images` mode and default recordings. */
  outputDir?: string;
  /** Frames written as separate files in `images` mode. */
  maxImages?: number;
  queueCapacity?: number;
  dequeueTimeoutMs?: number;
  /** Upper bound on waiting for the receiver after stopping. */
  receiverJoinTimeoutMs?: number;
}

export interface StreamSummary {
  mode: StreamClientMode;
  connected: boolean;
  frames: number;
  bytes: number;
  dropped: number;
  outputPath: string | null;
  savedImages: string[];
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** `received_mjpeg_YYYYMMDD_HHMMSS.mjpeg` in local time. */
export function defaultRecordingName(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `received_mjpeg_${day}_${time}.mjpeg`;
}

/** `frame_0000.jpg`, `frame_0001.jpg`, ... */
export function imageFileName(index: number): string {
  return `frame_${pad(index, 4)}.jpg`;
}

export class MjpegStreamClient {
  private readonly queue: BoundedFrameQueue<Frame>;
  private readonly demuxer = new FrameDemuxer();
  private socket: Socket | null = null;
  private receiver: Promise<void> = Promise.resolve();
  private running = false;
  private connected = false;
  private readonly dequeueTimeoutMs: number;
  private readonly joinTimeoutMs: number;

  constructor(private readonly options: StreamClientOptions) {
    this.queue = new BoundedFrameQueue<Frame>(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this.dequeueTimeoutMs = options.dequeueTimeoutMs ?? 1_000;
    this.joinTimeoutMs = options.receiverJoinTimeoutMs ?? 2_000;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Connects and consumes until the server closes the stream or {@link stop}
   * is called. Frames already queued are always consumed.
   */
  async run(): Promise<StreamSummary> {
    this.running = true;
    this.receiver = this.receive();
    log(`[StreamClient] Mode: ${this.options.mode}`);

    try {
      switch (this.options.mode) {
        case 'save':
          return await this.saveStream();
        case 'images':
          return await this.saveImages();
        case 'count':
          return await this.countFrames();
      }
    } finally {
      this.running = false;
      await this.joinReceiver();
    }
  }

  /** Stops receiving. The consumer finishes what is already queued. */
  async stop(): Promise<void> {
    log('[StreamClient] Stopping stream...');
    this.running = false;
    this.socket?.destroy();
    await this.joinReceiver();
  }

  private receive(): Promise<void> {
    const { host, port } = this.options;
    log(`[StreamClient] Connecting to ${host}:${port}...`);

    return new Promise((resolve) => {
      const socket = createConnection({ host, port });
      this.socket = socket;

      socket.on('connect', () => {
        this.connected = true;
        log('[StreamClient] Connected! Receiving MJPEG stream...');
        if (!this.running) socket.destroy();
      });

      socket.on('data', (chunk: Buffer) => {
        for (const frame of this.demuxer.feed(chunk)) {
          framesDemuxedTotal.inc({ source: 'stream_client' });
          if (!this.queue.enqueue(frame)) {
            framesDroppedTotal.inc({ queue: 'stream_client' });
          }
        }
      });

      socket.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ECONNREFUSED') {
          console.error(`[StreamClient] Could not connect to ${host}:${port}. Make sure the server is running.`);
        } else {
          console.error(`[StreamClient] Connection error: ${error.message}`);
        }
      });

      socket.on('close', () => {
        const discarded = this.demuxer.end();
        if (discarded > 0) {
          log(`[StreamClient] Discarded ${discarded} bytes of incomplete frame`);
        }
        this.running = false;
        this.socket = null;
        this.queue.close();
        resolve();
      });
    });
  }

  private async joinReceiver(): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const joined = await Promise.race([
      this.receiver.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), this.joinTimeoutMs);
      }),
    ]);
    clearTimeout(timer);
    if (!joined) {
      console.warn(`[StreamClient] Receiver did not finish within ${this.joinTimeoutMs}ms`);
      this.socket?.destroy();
      this.queue.close();
    }
  }

  /**
   * Yields queued frames until the queue is closed and drained. Timeouts
   * only re-check the running flag.
   */
  private async *frames(): AsyncGenerator<Frame> {
    while (true) {
      const next = await this.queue.dequeue(this.dequeueTimeoutMs);
      if (next.status === 'closed') return;
      if (next.status === 'timeout') {
        if (!this.running && this.queue.size === 0) return;
        continue;
      }
      yield next.item;
    }
  }

  private summary(frames: number, bytes: number, outputPath: string | null, savedImages: string[] = []): StreamSummary {
    return {
      mode: this.options.mode,
      connected: this.connected,
      frames,
      bytes,
      dropped: this.queue.droppedCount,
      outputPath,
      savedImages,
    };
  }

  private async saveStream(): Promise<StreamSummary> {
    const outputPath = this.options.output
      ?? join(this.options.outputDir ?? process.cwd(), defaultRecordingName());
    log(`[StreamClient] Saving MJPEG stream to: ${outputPath}`);

    let frames = 0;
    let bytes = 0;
    const file = await open(outputPath, 'w');
    try {
      for await (const frame of this.frames()) {
        await file.write(frame);
        frames++;
        bytes += frame.length;
        if (frames % 10 === 0) {
          log(`[StreamClient] Received ${frames} frames (${(bytes / 1024).toFixed(1)} KB)`);
        }
      }
    } finally {
      await file.close();
    }

    log(`[StreamClient] Received ${frames} MJPEG frames, ${(bytes / 1024).toFixed(1)} KB saved to ${outputPath}`);
    return this.summary(frames, bytes, outputPath);
  }

  private async saveImages(): Promise<StreamSummary> {
    const maxImages = this.options.maxImages ?? 10;
    const dir = this.options.outputDir ?? process.cwd();
    const saved: string[] = [];
    let frames = 0;
    let bytes = 0;

    for await (const frame of this.frames()) {
      frames++;
      bytes += frame.length;
      if (saved.length < maxImages) {
        const path = join(dir, imageFileName(saved.length));
        await writeFile(path, frame);
        saved.push(path);
        log(`[StreamClient] Saved frame ${saved.length}/${maxImages}: ${path}`);
      }
    }

    log(`[StreamClient] Total frames processed: ${frames}`);
    return this.summary(frames, bytes, null, saved);
  }

  private async countFrames(): Promise<StreamSummary> {
    let frames = 0;
    let bytes = 0;
    for await (const frame of this.frames()) {
      frames++;
      bytes += frame.length;
      if (frames % 10 === 0) {
        log(`[StreamClient] Received frame ${frames}`);
      }
    }
    log(`[StreamClient] Total frames received: ${frames}`);
    return this.summary(frames, bytes, null);
  }
}
