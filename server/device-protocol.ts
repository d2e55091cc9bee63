/**
 * @fileoverview Line-command TCP server for monochrome display clients.
 *
 * A client sends `GET_FRAME` and receives `OK\n`, a 4-byte little-endian
 * length, then that many bytes of packed 1bpp bitmap. Anything else that is
 * not blank gets `ERROR\n`. Each socket read is one command; there is no
 * line reassembly.
 *
 * Connections are served strictly one at a time. Sockets accepted while
 * another is active stay paused until it closes. Within a connection the next
 * read is not processed until the previous response has been written.
 */

import { EventEmitter } from 'events';
import { createServer, type Server, type Socket } from 'net';
import { deviceCommandsTotal } from './telemetry.js';

const log = (msg: string) => {
  console.log(msg);
};

export const OK_HEADER = Buffer.from('OK\n', 'ascii');
export const ERROR_RESPONSE = Buffer.from('ERROR\n', 'ascii');
export const GET_FRAME_COMMAND = 'GET_FRAME';

export const DEFAULT_DEVICE_PORT = 10001;
export const DEFAULT_DISPLAY_WIDTH = 240;
export const DEFAULT_DISPLAY_HEIGHT = 320;

/** Produces packed bitmaps on demand. Null means the capture failed. */
export interface DeviceFrameProvider {
  captureDeviceBitmap(width: number, height: number): Promise<Buffer | null>;
}

export interface DeviceFrameServerOptions {
  port?: number;
  host?: string;
  width?: number;
  height?: number;
}

/** Outcome of one command, as counted in metrics and emitted as `command`. */
export type CommandResult = 'frame' | 'capture_failed' | 'unknown' | 'invalid_utf8' | 'empty';

/** Builds the full success response for a bitmap. */
export function encodeFrameResponse(bitmap: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32LE(bitmap.length, 0);
  return Buffer.concat([OK_HEADER, length, bitmap]);
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Serves {@link DeviceFrameProvider} bitmaps over TCP.
 *
 * Emits `command` ({ command, result }) after each processed read and
 * `client-connected` / `client-disconnected` with the remote address.
 */
export class DeviceFrameServer extends EventEmitter {
  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  /** Tail of the serve chain; each connection runs after the previous one closes. */
  private turn: Promise<void> = Promise.resolve();
  private readonly port: number;
  private readonly host: string;
  private readonly width: number;
  private readonly height: number;

  constructor(private readonly provider: DeviceFrameProvider, options: DeviceFrameServerOptions = {}) {
    super();
    this.port = options.port ?? DEFAULT_DEVICE_PORT;
    this.host = options.host ?? '0.0.0.0';
    this.width = options.width ?? DEFAULT_DISPLAY_WIDTH;
    this.height = options.height ?? DEFAULT_DISPLAY_HEIGHT;
  }

  /**
   * Starts listening.
   *
   * @returns The bound port (useful when constructed with port 0).
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => this.accept(socket));
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        server.on('error', (error) => {
          console.error('[DeviceProtocol] Server error:', error);
        });
        this.server = server;
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.port;
        log(`[DeviceProtocol] Listening on ${this.host}:${port} (${this.width}x${this.height} bitmap)`);
        resolve(port);
      });
    });
  }

  /** Closes the listener and drops every connection, active or waiting. */
  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    for (const socket of this.sockets) {
      socket.destroy();
    }
    if (!server) return Promise.resolve();
    return new Promise((resolve) => {
      server.close(() => {
        log('[DeviceProtocol] Stopped');
        resolve();
      });
    });
  }

  /**
   * Handles one read and returns the bytes to send back, or null for none.
   * Never throws.
   */
  async respond(data: Buffer): Promise<{ response: Buffer | null; command: string; result: CommandResult }> {
    let command: string;
    try {
      command = utf8.decode(data).trim();
    } catch {
      console.warn(`[DeviceProtocol] Invalid UTF-8 in ${data.length}-byte command`);
      return { response: ERROR_RESPONSE, command: '', result: 'invalid_utf8' };
    }

    if (command === '') {
      return { response: null, command, result: 'empty' };
    }

    if (command !== GET_FRAME_COMMAND) {
      log(`[DeviceProtocol] Unknown command: '${command}'`);
      return { response: ERROR_RESPONSE, command, result: 'unknown' };
    }

    let bitmap: Buffer | null;
    try {
      bitmap = await this.provider.captureDeviceBitmap(this.width, this.height);
    } catch (error) {
      console.error('[DeviceProtocol] Frame capture error:', error);
      bitmap = null;
    }
    if (!bitmap) {
      return { response: ERROR_RESPONSE, command, result: 'capture_failed' };
    }
    return { response: encodeFrameResponse(bitmap), command, result: 'frame' };
  }

  private accept(socket: Socket): void {
    // Hold the socket until its turn; reads buffer in the kernel meanwhile
    socket.pause();
    this.sockets.add(socket);
    socket.on('error', (error) => {
      log(`[DeviceProtocol] Socket error from ${socket.remoteAddress}: ${error.message}`);
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
    });

    this.turn = this.turn.then(() => this.serve(socket));
  }

  /** Serves one connection. Resolves once it has closed. */
  private serve(socket: Socket): Promise<void> {
    if (socket.destroyed) return Promise.resolve();

    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    log(`[DeviceProtocol] Client connected: ${peer}`);
    this.emit('client-connected', peer);

    return new Promise((resolve) => {
      socket.on('close', () => {
        log(`[DeviceProtocol] Client disconnected: ${peer}`);
        this.emit('client-disconnected', peer);
        resolve();
      });

      socket.on('data', (data: Buffer) => {
        socket.pause();
        this.respond(data)
          .then(({ response, command, result }) => {
            deviceCommandsTotal.inc({ result });
            this.emit('command', { command, result });
            if (response && !socket.destroyed) {
              socket.write(response, () => socket.resume());
            } else {
              socket.resume();
            }
          })
          .catch((error: unknown) => {
            console.error('[DeviceProtocol] Command handling failed:', error);
            socket.destroy();
          });
      });

      socket.setNoDelay(true);
      socket.resume();
    });
  }
}
