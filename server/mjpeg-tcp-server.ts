/**
 * @fileoverview Raw MJPEG over TCP: complete JPEGs written back to back.
 *
 * There are no boundaries or length prefixes; receivers split frames on the
 * SOI/EOI markers. A frame is skipped for a client whose socket still has
 * unsent data, so a slow reader never accumulates a backlog.
 */

import { createServer, type Server, type Socket } from 'net';
import { streamClientsActive } from './telemetry.js';

const log = (msg: string) => {
  console.log(msg);
};

export interface MjpegTcpServerOptions {
  port?: number;
  host?: string;
  intervalMs?: number;
}

export class MjpegTcpServer {
  private server: Server | null = null;
  private readonly clients = new Set<Socket>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private readonly port: number;
  private readonly host: string;
  private readonly intervalMs: number;
  private framesSent = 0;
  private framesSkipped = 0;

  constructor(private readonly nextFrame: () => Promise<Buffer | null>, options: MjpegTcpServerOptions = {}) {
    this.port = options.port ?? 10002;
    this.host = options.host ?? '0.0.0.0';
    this.intervalMs = options.intervalMs ?? 100;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  get stats(): { sent: number; skipped: number } {
    return { sent: this.framesSent, skipped: this.framesSkipped };
  }

  /** Starts listening and the broadcast loop. Resolves with the bound port. */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => this.accept(socket));
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        this.server = server;
        this.running = true;
        this.schedule();
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.port;
        log(`[MjpegTcp] Streaming on ${this.host}:${port} every ${this.intervalMs}ms`);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    for (const socket of this.clients) {
      socket.destroy();
    }
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => server.close(() => resolve()));
  }

  private accept(socket: Socket): void {
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    socket.setNoDelay(true);
    this.clients.add(socket);
    streamClientsActive.inc({ transport: 'tcp' });
    log(`[MjpegTcp] Client connected: ${peer}`);

    socket.on('error', (error) => {
      log(`[MjpegTcp] Client ${peer} error: ${error.message}`);
    });
    socket.on('close', () => {
      this.clients.delete(socket);
      streamClientsActive.dec({ transport: 'tcp' });
      log(`[MjpegTcp] Client disconnected: ${peer}`);
    });
    // Clients never send anything meaningful; drain so the socket stays readable
    socket.resume();
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.broadcast()
        .catch((error: unknown) => {
          console.error('[MjpegTcp] Broadcast failed:', error);
        })
        .finally(() => this.schedule());
    }, this.intervalMs);
  }

  private async broadcast(): Promise<void> {
    if (this.clients.size === 0) return;

    const frame = await this.nextFrame();
    if (!frame) return;

    for (const socket of this.clients) {
      if (socket.destroyed) continue;
      if (socket.writableLength > 0) {
        this.framesSkipped++;
        continue;
      }
      socket.write(frame);
      this.framesSent++;
    }
  }
}
