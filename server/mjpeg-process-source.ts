/**
 * @fileoverview Camera frame source backed by an MJPEG-producing child process.
 *
 * Spawns ffmpeg on a V4L2 device (or rpicam-vid / libcamera-vid on a Pi
 * camera module), splits its stdout into JPEG frames and keeps only the
 * newest one. `capture()` decodes that frame on demand.
 */

import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import { basename } from 'path';
import type { Readable } from 'stream';
import { CaptureError, type FrameSource } from './camera.js';
import { FrameDemuxer, parseJpegDimensions } from './frame-demuxer.js';
import { decodeJpeg } from './jimp-encoder.js';
import { framesDemuxedTotal } from './telemetry.js';
import type { Frame, RawImage } from './types.js';

const log = (msg: string) => {
  console.log(msg);
};

/** The parts of a child process this source relies on. */
export interface CaptureProcess extends EventEmitter {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnCapture = (command: string, args: string[]) => CaptureProcess;

export interface MjpegProcessOptions {
  /** Executable; its basename selects the argument style. */
  command?: string;
  device?: string;
  width?: number;
  height?: number;
  fps?: number;
  /** ffmpeg `-q:v` (2-31, lower is better). */
  quality?: number;
  /** How long `start()` waits for the first frame. */
  warmupMs?: number;
  spawnProcess?: SpawnCapture;
}

const STOP_TIMEOUT_MS = 2_000;

const defaultSpawn: SpawnCapture = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Builds the argument list for the capture command.
 *
 * Input format flags come before `-i` so the camera itself delivers MJPEG
 * instead of a raw format that would need software encoding.
 */
export function buildCaptureArgs(command: string, opts: Required<Pick<MjpegProcessOptions, 'device' | 'width' | 'height' | 'fps' | 'quality'>>): string[] {
  const tool = basename(command);
  if (tool.startsWith('rpicam-vid') || tool.startsWith('libcamera-vid')) {
    return [
      '-t', '0',
      '-n',
      '--codec', 'mjpeg',
      '--width', String(opts.width),
      '--height', String(opts.height),
      '--framerate', String(opts.fps),
      '-o', '-',
    ];
  }
  return [
    '-hide_banner',
    '-fflags', 'nobuffer',
    '-probesize', '32',
    '-analyzeduration', '0',
    '-f', 'v4l2',
    '-input_format', 'mjpeg',
    '-video_size', `${opts.width}x${opts.height}`,
    '-framerate', String(opts.fps),
    '-i', opts.device,
    '-f', 'mjpeg',
    '-q:v', String(opts.quality),
    '-',
  ];
}

/**
 * Emits `frame` (Frame) for each demuxed JPEG and `exit` ({ code, signal })
 * when the capture process ends.
 */
export class MjpegProcessSource extends EventEmitter implements FrameSource {
  readonly name: string;
  private readonly command: string;
  private readonly args: string[];
  private readonly warmupMs: number;
  private readonly spawnProcess: SpawnCapture;
  private proc: CaptureProcess | null = null;
  private exited: Promise<void> = Promise.resolve();
  private demuxer = new FrameDemuxer();
  private latest: Frame | null = null;
  private decoded: { frame: Frame; image: RawImage } | null = null;
  private dims: { width: number; height: number } | null = null;

  constructor(options: MjpegProcessOptions = {}) {
    super();
    this.command = options.command ?? 'ffmpeg';
    this.name = basename(this.command);
    this.args = buildCaptureArgs(this.command, {
      device: options.device ?? '/dev/video0',
      width: options.width ?? 320,
      height: options.height ?? 240,
      fps: options.fps ?? 15,
      quality: options.quality ?? 5,
    });
    this.warmupMs = options.warmupMs ?? 1_000;
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
  }

  get isActive(): boolean {
    return this.proc !== null;
  }

  get resolution(): { width: number; height: number } | null {
    return this.dims;
  }

  /**
   * Spawns the capture process and waits up to the warm-up time for a frame.
   *
   * @throws CaptureError if the process fails to spawn or exits during warm-up.
   */
  async start(): Promise<void> {
    if (this.proc) return;

    log(`[MjpegSource] Spawning: ${this.command} ${this.args.join(' ')}`);
    const proc = this.spawnProcess(this.command, this.args);
    this.proc = proc;
    this.demuxer = new FrameDemuxer();
    this.latest = null;
    this.decoded = null;

    this.exited = new Promise((resolve) => {
      proc.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        log(`[MjpegSource] ${this.name} exited with code ${code}${signal ? ` (${signal})` : ''}`);
        const dropped = this.demuxer.end();
        if (dropped > 0) {
          log(`[MjpegSource] Discarded ${dropped} bytes of incomplete frame`);
        }
        if (this.proc === proc) this.proc = null;
        this.emit('exit', { code, signal });
        resolve();
      });
    });

    proc.on('error', (error: Error) => {
      console.error(`[MjpegSource] ${this.name} process error:`, error.message);
    });
    proc.stdout.on('data', (chunk: Buffer) => this.handleChunk(chunk));
    proc.stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString('utf-8').trim();
      if (text) log(`[${this.name} stderr] ${text}`);
    });

    await this.waitForFirstFrame(proc);
  }

  async capture(): Promise<RawImage | null> {
    const frame = this.latest;
    if (!frame) return null;
    if (this.decoded?.frame === frame) return this.decoded.image;

    const image = await decodeJpeg(frame);
    this.decoded = { frame, image };
    return image;
  }

  /** Raw bytes of the newest complete JPEG, without decoding. */
  latestFrame(): Frame | null {
    return this.latest;
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;

    log(`[MjpegSource] Stopping ${this.name}`);
    proc.kill('SIGTERM');
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = await Promise.race([
      this.exited.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), STOP_TIMEOUT_MS);
      }),
    ]);
    clearTimeout(timer);
    if (timedOut) {
      console.warn(`[MjpegSource] ${this.name} ignored SIGTERM, sending SIGKILL`);
      proc.kill('SIGKILL');
    }
    this.proc = null;
  }

  private handleChunk(chunk: Buffer): void {
    const frames = this.demuxer.feed(chunk);
    for (const frame of frames) {
      if (!this.dims) {
        this.dims = parseJpegDimensions(frame);
        if (this.dims) {
          log(`[MjpegSource] First frame: ${this.dims.width}x${this.dims.height}, ${frame.length} bytes`);
        }
      }
      this.latest = frame;
      framesDemuxedTotal.inc({ source: 'capture' });
      this.emit('frame', frame);
    }
  }

  private waitForFirstFrame(proc: CaptureProcess): Promise<void> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        this.off('frame', onFrame);
        proc.off('exit', onExit);
        proc.off('error', onError);
      };
      const onFrame = () => {
        cleanup();
        resolve();
      };
      const onExit = (code: number | null) => {
        cleanup();
        reject(new CaptureError(`${this.name} exited during warm-up with code ${code}`));
      };
      const onError = (error: Error) => {
        cleanup();
        this.proc = null;
        reject(new CaptureError(`Failed to start ${this.name}: ${error.message}`));
      };
      const timer = setTimeout(() => {
        cleanup();
        console.warn(`[MjpegSource] No frame from ${this.name} after ${this.warmupMs}ms, continuing`);
        resolve();
      }, this.warmupMs);

      this.on('frame', onFrame);
      proc.on('exit', onExit);
      proc.on('error', onError);
    });
  }
}
