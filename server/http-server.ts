/**
 * @fileoverview Express app serving single JPEG frames and multipart MJPEG streams.
 *
 * Frame routes answer 503 when the camera produced nothing and 500 when a
 * handler threw. Stream routes run until the client disconnects, pacing
 * captures and respecting socket backpressure.
 */

import express, { type Express, type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import type { CameraService } from './camera.js';
import type { StreamingConfig } from './config.js';
import { metricsHandler, metricsMiddleware, streamClientsActive } from './telemetry.js';

const log = (msg: string) => {
  console.log(msg);
};

/** What the routes need from the camera. */
export type HttpCamera = Pick<
  CameraService,
  | 'isActive'
  | 'captureJpeg'
  | 'captureGrayscaleJpeg'
  | 'captureCompressedJpeg'
  | 'captureThumbnail'
  | 'getStatus'
  | 'getCompressionStats'
>;

export const MULTIPART_BOUNDARY = 'frame';

const NO_CACHE_HEADERS = {
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
} as const;

export const ENDPOINTS = {
  single_frame: '/frame',
  grayscale_frame: '/frame_gray',
  compressed_frame: '/frame_compressed',
  thumbnail: '/thumbnail',
  mjpeg_stream: '/stream',
  mjpeg_stream_gray: '/stream_gray',
  mjpeg_stream_compressed: '/stream_compressed',
  server_info: '/info',
  health_check: '/health',
  feature_status: '/features',
  metrics: '/metrics',
} as const;

const DEFAULT_STREAMING: StreamingConfig = {
  frameDelayMs: 100,
  compressedFrameDelayMs: 150,
  retryDelayMs: 100,
  rawIntervalMs: 100,
};

/** One part of a `multipart/x-mixed-replace` body, trailing CRLF included. */
export function formatMultipartPart(jpeg: Buffer): Buffer {
  const header = Buffer.from(
    `--${MULTIPART_BOUNDARY}\r\nContent-Type: image/jpeg\r\nContent-Length: ${jpeg.length}\r\n\r\n`,
    'ascii'
  );
  return Buffer.concat([header, jpeg, Buffer.from('\r\n', 'ascii')]);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** Resolves when the response can take more data or has gone away. */
function waitForDrain(res: Response): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
  });
}

function frameRoute(label: string, capture: () => Promise<Buffer | null>) {
  return async (_req: Request, res: Response) => {
    try {
      const jpeg = await capture();
      if (!jpeg) {
        res.status(503).type('text/plain').send('Camera not available');
        return;
      }
      res.set(NO_CACHE_HEADERS);
      res.set('Content-Type', 'image/jpeg');
      res.set('Content-Length', String(jpeg.length));
      res.end(jpeg);
    } catch (error) {
      console.error(`[HTTP] ${label} route error:`, error);
      res.status(500).type('text/plain').send(`Server error: ${errorMessage(error)}`);
    }
  };
}

function streamRoute(label: string, capture: () => Promise<Buffer | null>, frameDelayMs: number, retryDelayMs: number) {
  return (req: Request, res: Response) => {
    let open = true;
    res.on('close', () => {
      open = false;
    });

    res.writeHead(200, {
      'Content-Type': `multipart/x-mixed-replace; boundary=${MULTIPART_BOUNDARY}`,
      ...NO_CACHE_HEADERS,
      Connection: 'close',
    });

    const peer = req.socket.remoteAddress ?? 'unknown';
    log(`[HTTP] ${label} stream started for ${peer}`);
    streamClientsActive.inc({ transport: 'http' });

    const run = async () => {
      let frames = 0;
      while (open) {
        const jpeg = await capture();
        if (!open) break;
        if (jpeg) {
          frames++;
          if (!res.write(formatMultipartPart(jpeg))) {
            await waitForDrain(res);
          }
        } else {
          await sleep(retryDelayMs);
        }
        await sleep(frameDelayMs);
      }
      return frames;
    };

    run()
      .then((frames) => {
        log(`[HTTP] ${label} stream ended for ${peer} after ${frames} frames`);
      })
      .catch((error: unknown) => {
        console.error(`[HTTP] ${label} stream error:`, error);
        res.destroy();
      })
      .finally(() => {
        streamClientsActive.dec({ transport: 'http' });
      });
  };
}

/**
 * Builds the Express app.
 *
 * @param camera - Capture backend shared with the other servers.
 * @param streaming - Stream pacing; defaults to ~10 fps and ~6-7 fps compressed.
 */
export function createHttpApp(camera: HttpCamera, streaming: StreamingConfig = DEFAULT_STREAMING): Express {
  const app = express();

  // Records HTTP request duration and count
  app.use(metricsMiddleware);
  app.get(ENDPOINTS.metrics, metricsHandler);

  app.get(ENDPOINTS.single_frame, frameRoute('Frame', () => camera.captureJpeg()));
  app.get(ENDPOINTS.grayscale_frame, frameRoute('Grayscale frame', () => camera.captureGrayscaleJpeg()));
  app.get(ENDPOINTS.compressed_frame, frameRoute('Compressed frame', () => camera.captureCompressedJpeg()));
  app.get(ENDPOINTS.thumbnail, frameRoute('Thumbnail', () => camera.captureThumbnail()));

  app.get(ENDPOINTS.mjpeg_stream, streamRoute(
    'MJPEG', () => camera.captureJpeg(), streaming.frameDelayMs, streaming.retryDelayMs
  ));
  app.get(ENDPOINTS.mjpeg_stream_gray, streamRoute(
    'Grayscale', () => camera.captureGrayscaleJpeg(), streaming.frameDelayMs, streaming.retryDelayMs
  ));
  app.get(ENDPOINTS.mjpeg_stream_compressed, streamRoute(
    'Compressed', () => camera.captureCompressedJpeg(), streaming.compressedFrameDelayMs, streaming.retryDelayMs
  ));

  app.get('/', (_req, res) => {
    const status = camera.getStatus();
    res.json({
      server: 'Camera stream server',
      resolution: status.resolution,
      endpoints: ENDPOINTS,
      grayscale_processing: status.grayscale_processing,
      advanced_compression: status.advanced_compression,
    });
  });

  app.get(ENDPOINTS.server_info, (_req, res) => {
    res.json({
      ...camera.getStatus(),
      compression_stats: camera.getCompressionStats(),
      usage: {
        display_recommended: `GET ${ENDPOINTS.single_frame}`,
        display_grayscale: `GET ${ENDPOINTS.grayscale_frame}`,
        display_compressed: `GET ${ENDPOINTS.compressed_frame}`,
        browser_stream: `GET ${ENDPOINTS.mjpeg_stream}`,
        browser_stream_gray: `GET ${ENDPOINTS.mjpeg_stream_gray}`,
        browser_stream_compressed: `GET ${ENDPOINTS.mjpeg_stream_compressed}`,
      },
    });
  });

  app.get(ENDPOINTS.health_check, (_req, res) => {
    const healthy = camera.isActive;
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      camera_initialized: healthy,
      timestamp: Math.floor(Date.now() / 1000),
    });
  });

  app.get(ENDPOINTS.feature_status, (_req, res) => {
    const status = camera.getStatus();
    res.json({
      grayscale_processing: status.grayscale_processing,
      advanced_compression: status.advanced_compression,
      face_detection: status.face_detection,
      compressed_budget_bytes: status.compressed_budget_bytes,
    });
  });

  return app;
}

/**
 * Starts an HTTP server for the app.
 *
 * @returns The listening server and its bound port.
 */
export function startHttpServer(app: Express, port: number, host = '0.0.0.0'): Promise<{ server: Server; port: number }> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;
      log(`[HTTP] Server running on ${host}:${boundPort}`);
      resolve({ server, port: boundPort });
    });
  });
}
