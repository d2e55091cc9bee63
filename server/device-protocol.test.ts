/**
 * @fileoverview Tests for the display-client TCP protocol.
 *
 * Runs the real server on an ephemeral port with a scripted frame provider.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Socket } from 'net';
import {
  DeviceFrameServer,
  ERROR_RESPONSE,
  encodeFrameResponse,
  type CommandResult,
  type DeviceFrameProvider,
} from './device-protocol.js';
import { captureEvents, connectTcp, receiveBytes } from '../tests/server/test-utils.js';

/** Provider that returns a fixed bitmap and records the requested size. */
class MockFrameProvider implements DeviceFrameProvider {
  bitmap: Buffer | null = Buffer.from([0x01, 0x02, 0x03]);
  failWith: Error | null = null;
  requests: Array<{ width: number; height: number }> = [];

  async captureDeviceBitmap(width: number, height: number): Promise<Buffer | null> {
    this.requests.push({ width, height });
    if (this.failWith) throw this.failWith;
    return this.bitmap;
  }
}

const frameResponse = Buffer.from([
  0x4f, 0x4b, 0x0a, // OK\n
  0x03, 0x00, 0x00, 0x00, // length 3, little-endian
  0x01, 0x02, 0x03,
]);

describe('encodeFrameResponse', () => {
  test('prefixes the bitmap with OK and a little-endian length', () => {
    expect(encodeFrameResponse(Buffer.from([1, 2, 3])).equals(frameResponse)).toBe(true);
  });

  test('encodes a full display frame length', () => {
    const response = encodeFrameResponse(Buffer.alloc(9600));
    expect(response.length).toBe(3 + 4 + 9600);
    expect([...response.subarray(3, 7)]).toEqual([0x80, 0x25, 0x00, 0x00]);
  });
});

describe('DeviceFrameServer.respond', () => {
  let provider: MockFrameProvider;
  let server: DeviceFrameServer;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    provider = new MockFrameProvider();
    server = new DeviceFrameServer(provider);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('answers GET_FRAME with a framed bitmap at the display size', async () => {
    const { response, result } = await server.respond(Buffer.from('GET_FRAME\n'));

    expect(result).toBe('frame');
    expect(response?.equals(frameResponse)).toBe(true);
    expect(provider.requests).toEqual([{ width: 240, height: 320 }]);
  });

  test('trims surrounding whitespace', async () => {
    const { command, result } = await server.respond(Buffer.from('  GET_FRAME \r\n'));
    expect(command).toBe('GET_FRAME');
    expect(result).toBe('frame');
  });

  test('is case sensitive', async () => {
    const { response, result } = await server.respond(Buffer.from('get_frame'));
    expect(result).toBe('unknown');
    expect(response).toBe(ERROR_RESPONSE);
  });

  test('rejects unknown commands', async () => {
    const { response, command, result } = await server.respond(Buffer.from('PING\n'));
    expect(command).toBe('PING');
    expect(result).toBe('unknown');
    expect(response?.toString()).toBe('ERROR\n');
  });

  test('rejects bytes that are not UTF-8', async () => {
    const { response, result } = await server.respond(Buffer.from([0xff, 0xfe]));
    expect(result).toBe('invalid_utf8');
    expect(response).toBe(ERROR_RESPONSE);
  });

  test('ignores blank reads', async () => {
    const { response, result } = await server.respond(Buffer.from(' \n'));
    expect(result).toBe('empty');
    expect(response).toBeNull();
  });

  test('reports a failed capture as ERROR', async () => {
    provider.bitmap = null;
    const { response, result } = await server.respond(Buffer.from('GET_FRAME'));
    expect(result).toBe('capture_failed');
    expect(response).toBe(ERROR_RESPONSE);
  });

  test('reports a throwing capture as ERROR', async () => {
    provider.failWith = new Error('sensor gone');
    const { response, result } = await server.respond(Buffer.from('GET_FRAME'));
    expect(result).toBe('capture_failed');
    expect(response).toBe(ERROR_RESPONSE);
  });

  test('uses the configured display size', async () => {
    const custom = new DeviceFrameServer(provider, { width: 128, height: 64 });
    await custom.respond(Buffer.from('GET_FRAME'));
    expect(provider.requests).toEqual([{ width: 128, height: 64 }]);
  });
});

describe('DeviceFrameServer over TCP', () => {
  let provider: MockFrameProvider;
  let server: DeviceFrameServer;
  let port: number;
  const clients: Socket[] = [];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    provider = new MockFrameProvider();
    server = new DeviceFrameServer(provider, { port: 0, host: '127.0.0.1' });
    port = await server.start();
  });

  afterEach(async () => {
    for (const socket of clients.splice(0)) socket.destroy();
    await server.stop();
    vi.restoreAllMocks();
  });

  async function connect() {
    const client = await connectTcp(port);
    clients.push(client.socket);
    return client;
  }

  test('binds an ephemeral port', () => {
    expect(port).toBeGreaterThan(0);
  });

  test('serves a frame for GET_FRAME', async () => {
    const { socket, received } = await connect();
    socket.write('GET_FRAME\n');

    const data = await receiveBytes(received, frameResponse.length);
    expect(data.equals(frameResponse)).toBe(true);
  });

  test('sends ERROR for unknown and invalid commands', async () => {
    const { socket, received } = await connect();
    socket.write('HELLO\n');
    await receiveBytes(received, 6);

    socket.write(Buffer.from([0xff, 0xfe]));
    const data = await receiveBytes(received, 12);
    expect(data.toString('latin1')).toBe('ERROR\nERROR\n');
  });

  test('serves GET_FRAME after an unknown command on the same connection', async () => {
    const { socket, received } = await connect();
    socket.write('FOO');
    expect((await receiveBytes(received, ERROR_RESPONSE.length)).equals(ERROR_RESPONSE)).toBe(true);

    socket.write('GET_FRAME');
    const expected = Buffer.concat([ERROR_RESPONSE, frameResponse]);
    const data = await receiveBytes(received, expected.length);
    expect(data.equals(expected)).toBe(true);

    await new Promise(resolve => setTimeout(resolve, 50));
    expect(received().length).toBe(expected.length);
  });

  test('sends a full display frame after an error', async () => {
    const bitmap = Buffer.alloc(9600, 0xff);
    provider.bitmap = bitmap;
    const { socket, received } = await connect();
    socket.write('FOO');
    await receiveBytes(received, ERROR_RESPONSE.length);
    socket.write('GET_FRAME');

    const data = await receiveBytes(received, 6 + 3 + 4 + 9600);
    expect(data.subarray(0, 13).toString('latin1')).toBe('ERROR\nOK\n\x80\x25\x00\x00');
    expect(data.subarray(13).equals(bitmap)).toBe(true);
    expect(data.length).toBe(6 + 3 + 4 + 9600);
  });

  test('sends ERROR when the capture fails', async () => {
    provider.bitmap = null;
    const { socket, received } = await connect();
    socket.write('GET_FRAME');

    expect((await receiveBytes(received, 6)).toString()).toBe('ERROR\n');
  });

  test('answers successive commands on one connection', async () => {
    const { socket, received } = await connect();
    socket.write('GET_FRAME');
    await receiveBytes(received, frameResponse.length);
    socket.write('GET_FRAME');

    const data = await receiveBytes(received, frameResponse.length * 2);
    expect(data.equals(Buffer.concat([frameResponse, frameResponse]))).toBe(true);
  });

  test('emits a command event per processed read', async () => {
    const { events, cleanup } = captureEvents<{ command: string; result: CommandResult }>(server, 'command');
    const { socket, received } = await connect();
    socket.write('GET_FRAME');
    await receiveBytes(received, frameResponse.length);
    socket.write('NOPE');
    await receiveBytes(received, frameResponse.length + 6);
    cleanup();

    expect(events).toEqual([
      { command: 'GET_FRAME', result: 'frame' },
      { command: 'NOPE', result: 'unknown' },
    ]);
  });

  test('serves a waiting client only after the active one closes', async () => {
    const first = await connect();
    const second = await connect();

    second.socket.write('GET_FRAME');
    first.socket.write('GET_FRAME');
    await receiveBytes(first.received, frameResponse.length);
    await new Promise(resolve => setTimeout(resolve, 50));
    expect(second.received().length).toBe(0);

    first.socket.end();
    const data = await receiveBytes(second.received, frameResponse.length);
    expect(data.equals(frameResponse)).toBe(true);
  });
});
