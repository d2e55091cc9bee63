/**
 * @fileoverview Tests for the raw MJPEG-over-TCP broadcaster.
 */

import { describe, test, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type { Socket } from 'net';
import { FrameDemuxer } from '../../server/frame-demuxer.js';
import { MjpegTcpServer } from '../../server/mjpeg-tcp-server.js';
import { connectTcp, createMockJpegFrame, receiveBytes, waitFor } from './test-utils.js';

describe('MjpegTcpServer', () => {
  const frame = createMockJpegFrame({ width: 320, height: 240, fill: 0x07 });
  let server: MjpegTcpServer;
  let nextFrame: Mock<() => Promise<Buffer | null>>;
  let port: number;
  const clients: Socket[] = [];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    nextFrame = vi.fn<() => Promise<Buffer | null>>(async () => frame);
    server = new MjpegTcpServer(nextFrame, { port: 0, host: '127.0.0.1', intervalMs: 10 });
    port = await server.start();
  });

  afterEach(async () => {
    for (const socket of clients.splice(0)) socket.destroy();
    await server.stop();
    vi.restoreAllMocks();
  });

  test('does not capture while nobody is connected', async () => {
    await new Promise(resolve => setTimeout(resolve, 50));
    expect(nextFrame).not.toHaveBeenCalled();
  });

  test('writes complete JPEGs back to back', async () => {
    const { socket, received } = await connectTcp(port);
    clients.push(socket);

    const data = await receiveBytes(received, frame.length * 3);
    const frames = new FrameDemuxer().feed(data);

    expect(frames.length).toBeGreaterThanOrEqual(3);
    expect(frames.every(f => f.equals(frame))).toBe(true);
    expect(data.subarray(0, frame.length).equals(frame)).toBe(true);
  });

  test('tracks connected clients', async () => {
    const { socket } = await connectTcp(port);
    clients.push(socket);
    await waitFor(() => server.clientCount === 1);

    socket.destroy();
    await waitFor(() => server.clientCount === 0);
  });

  test('skips a tick when the camera has no frame', async () => {
    nextFrame.mockResolvedValue(null);
    const { socket, received } = await connectTcp(port);
    clients.push(socket);

    await waitFor(() => nextFrame.mock.calls.length >= 3);
    expect(received().length).toBe(0);
    expect(server.stats.sent).toBe(0);
  });

  test('keeps broadcasting after a capture error', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    nextFrame.mockRejectedValueOnce(new Error('camera busy'));
    const { socket, received } = await connectTcp(port);
    clients.push(socket);

    await receiveBytes(received, frame.length);
    expect(console.error).toHaveBeenCalledWith('[MjpegTcp] Broadcast failed:', new Error('camera busy'));
  });

  test('stop disconnects clients', async () => {
    const { socket } = await connectTcp(port);
    clients.push(socket);
    await waitFor(() => server.clientCount === 1);

    const closed = new Promise<void>(resolve => socket.once('close', () => resolve()));
    await server.stop();
    await closed;
    expect(server.clientCount).toBe(0);
  });
});
