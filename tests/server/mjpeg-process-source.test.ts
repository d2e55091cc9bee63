/**
 * @fileoverview Tests for the child-process MJPEG frame source.
 *
 * The capture process is replaced by FakeCaptureProcess, so no ffmpeg or
 * camera is needed.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { CaptureError } from '../../server/camera.js';
import { JimpImageEncoder } from '../../server/jimp-encoder.js';
import { MjpegProcessSource, buildCaptureArgs, type MjpegProcessOptions } from '../../server/mjpeg-process-source.js';
import { FakeCaptureProcess, createMockJpegFrame, solidImage } from './test-utils.js';

/** Process that ignores signals until told otherwise. */
class StubbornProcess extends FakeCaptureProcess {
  override kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    return true;
  }
}

function sourceWith(proc: FakeCaptureProcess, options: MjpegProcessOptions = {}) {
  const spawned: Array<{ command: string; args: string[] }> = [];
  const source = new MjpegProcessSource({
    warmupMs: 500,
    ...options,
    spawnProcess: (command, args) => {
      spawned.push({ command, args });
      return proc;
    },
  });
  return { source, spawned };
}

describe('buildCaptureArgs', () => {
  const opts = { device: '/dev/video2', width: 640, height: 480, fps: 30, quality: 5 };

  test('requests MJPEG straight from a V4L2 device with ffmpeg', () => {
    expect(buildCaptureArgs('ffmpeg', opts)).toEqual([
      '-hide_banner',
      '-fflags', 'nobuffer',
      '-probesize', '32',
      '-analyzeduration', '0',
      '-f', 'v4l2',
      '-input_format', 'mjpeg',
      '-video_size', '640x480',
      '-framerate', '30',
      '-i', '/dev/video2',
      '-f', 'mjpeg',
      '-q:v', '5',
      '-',
    ]);
  });

  test('uses the Pi camera tool syntax for rpicam-vid', () => {
    expect(buildCaptureArgs('/usr/bin/rpicam-vid', opts)).toEqual([
      '-t', '0',
      '-n',
      '--codec', 'mjpeg',
      '--width', '640',
      '--height', '480',
      '--framerate', '30',
      '-o', '-',
    ]);
  });

  test('treats libcamera-vid like rpicam-vid', () => {
    expect(buildCaptureArgs('libcamera-vid', opts)[0]).toBe('-t');
  });
});

describe('MjpegProcessSource', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  test('names itself after the command', () => {
    expect(new MjpegProcessSource({ command: '/opt/bin/rpicam-vid' }).name).toBe('rpicam-vid');
    expect(new MjpegProcessSource().name).toBe('ffmpeg');
  });

  test('start resolves once the first frame arrives', async () => {
    const proc = new FakeCaptureProcess();
    const { source, spawned } = sourceWith(proc, { command: 'ffmpeg', device: '/dev/video1' });

    const starting = source.start();
    proc.stdout.write(createMockJpegFrame({ width: 320, height: 240 }));
    await starting;

    expect(source.isActive).toBe(true);
    expect(source.resolution).toEqual({ width: 320, height: 240 });
    expect(spawned).toHaveLength(1);
    expect(spawned[0].command).toBe('ffmpeg');
    expect(spawned[0].args).toContain('/dev/video1');
    expect(console.warn).not.toHaveBeenCalled();
  });

  test('start continues after the warm-up without a frame', async () => {
    const proc = new FakeCaptureProcess();
    const { source } = sourceWith(proc, { warmupMs: 20 });

    await source.start();

    expect(source.isActive).toBe(true);
    expect(source.resolution).toBeNull();
    expect(console.warn).toHaveBeenCalledWith('[MjpegSource] No frame from ffmpeg after 20ms, continuing');
  });

  test('start rejects when the process exits during warm-up', async () => {
    const proc = new FakeCaptureProcess();
    const { source } = sourceWith(proc);

    const starting = source.start();
    proc.emit('exit', 1, null);

    await expect(starting).rejects.toThrow(new CaptureError('ffmpeg exited during warm-up with code 1'));
    expect(source.isActive).toBe(false);
  });

  test('start rejects when the command cannot be spawned', async () => {
    const proc = new FakeCaptureProcess();
    const { source } = sourceWith(proc);

    const starting = source.start();
    proc.emit('error', new Error('spawn ffmpeg ENOENT'));

    await expect(starting).rejects.toBeInstanceOf(CaptureError);
    expect(source.isActive).toBe(false);
  });

  test('keeps only the newest complete frame', async () => {
    const proc = new FakeCaptureProcess();
    const { source } = sourceWith(proc);
    const frames: Buffer[] = [];
    source.on('frame', (frame: Buffer) => frames.push(frame));

    const starting = source.start();
    const first = createMockJpegFrame({ fill: 0x01 });
    const second = createMockJpegFrame({ fill: 0x02 });
    proc.stdout.write(Buffer.concat([first, second.subarray(0, 8)]));
    await starting;
    expect(source.latestFrame()?.equals(first)).toBe(true);

    proc.stdout.write(second.subarray(8));
    await vi.waitFor(() => {
      expect(frames).toHaveLength(2);
    });
    expect(source.latestFrame()?.equals(second)).toBe(true);
  });

  test('capture returns null before any frame', async () => {
    const { source } = sourceWith(new FakeCaptureProcess(), { warmupMs: 1 });
    await source.start();

    expect(await source.capture()).toBeNull();
  });

  test('capture decodes the latest frame once', async () => {
    const jpeg = await new JimpImageEncoder().encode(solidImage(16, 8, 120), { quality: 90, scale: 1 });
    if (!jpeg) throw new Error('encode failed');
    const proc = new FakeCaptureProcess();
    const { source } = sourceWith(proc);

    const starting = source.start();
    proc.stdout.write(jpeg);
    await starting;

    const image = await source.capture();
    expect(image?.width).toBe(16);
    expect(image?.height).toBe(8);
    expect(await source.capture()).toBe(image);
  });

  test('stop terminates the process and emits exit', async () => {
    const proc = new FakeCaptureProcess();
    const { source } = sourceWith(proc, { warmupMs: 1 });
    await source.start();
    const exits: unknown[] = [];
    source.on('exit', (info: unknown) => exits.push(info));

    await source.stop();

    expect(proc.signals).toEqual(['SIGTERM']);
    expect(source.isActive).toBe(false);
    expect(exits).toEqual([{ code: null, signal: 'SIGTERM' }]);
  });

  test('stop escalates to SIGKILL when the process ignores SIGTERM', async () => {
    const proc = new StubbornProcess();
    const { source } = sourceWith(proc, { warmupMs: 1 });
    await source.start();

    vi.useFakeTimers();
    const stopping = source.stop();
    await vi.advanceTimersByTimeAsync(2000);
    await stopping;

    expect(proc.signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(source.isActive).toBe(false);
  });

  test('an unexpected exit marks the source inactive', async () => {
    const proc = new FakeCaptureProcess();
    const { source } = sourceWith(proc, { warmupMs: 1 });
    await source.start();

    proc.emit('exit', 0, null);

    expect(source.isActive).toBe(false);
  });

  test('stop on an idle source is a no-op', async () => {
    const source = new MjpegProcessSource();
    await source.stop();
    expect(source.isActive).toBe(false);
  });
});
