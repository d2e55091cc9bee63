/**
 * @fileoverview Server-side telemetry using prom-client for Prometheus metrics.
 *
 * Defines the camera, streaming and protocol metrics, Express middleware for
 * HTTP request instrumentation, and the /metrics scrape handler.
 */

import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

// Dedicated registry (avoids polluting the global default)
export const metricsRegistry = new Registry();

// Collect default process metrics (CPU, memory, event loop lag, GC, etc.)
collectDefaultMetrics({ register: metricsRegistry });

// ─── HTTP Metrics ────────────────────────────────────────────────────────────

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [metricsRegistry],
});

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [metricsRegistry],
});

// ─── Camera Metrics ──────────────────────────────────────────────────────────

export const captureDuration = new Histogram({
  name: 'camera_capture_duration_seconds',
  help: 'Time to capture, transform and encode one frame',
  labelNames: ['kind'] as const,
  buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [metricsRegistry],
});

export const capturesTotal = new Counter({
  name: 'camera_captures_total',
  help: 'Total capture requests by output kind and result',
  labelNames: ['kind', 'result'] as const,
  registers: [metricsRegistry],
});

export const compressionOutputBytes = new Histogram({
  name: 'compression_output_bytes',
  help: 'Size of budget-compressed JPEG output',
  labelNames: ['algorithm'] as const,
  buckets: [1024, 2048, 4096, 8192, 16384, 32768, 65536],
  registers: [metricsRegistry],
});

// ─── Stream Metrics ──────────────────────────────────────────────────────────

export const framesDemuxedTotal = new Counter({
  name: 'mjpeg_frames_demuxed_total',
  help: 'Complete JPEG frames extracted from MJPEG byte streams',
  labelNames: ['source'] as const,
  registers: [metricsRegistry],
});

export const framesDroppedTotal = new Counter({
  name: 'frame_queue_dropped_total',
  help: 'Frames dropped because a bounded queue was full',
  labelNames: ['queue'] as const,
  registers: [metricsRegistry],
});

export const streamClientsActive = new Gauge({
  name: 'stream_clients_active',
  help: 'Number of connected streaming clients',
  labelNames: ['transport'] as const,
  registers: [metricsRegistry],
});

// ─── Device and Upload Metrics ───────────────────────────────────────────────

export const deviceCommandsTotal = new Counter({
  name: 'device_commands_total',
  help: 'Display protocol commands by result',
  labelNames: ['result'] as const,
  registers: [metricsRegistry],
});

export const uploadsTotal = new Counter({
  name: 'capture_uploads_total',
  help: 'Capture uploads by result',
  labelNames: ['result'] as const,
  registers: [metricsRegistry],
});

export const uploadDuration = new Histogram({
  name: 'capture_upload_duration_seconds',
  help: 'Duration of capture upload requests',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [metricsRegistry],
});

// ─── Express Middleware ──────────────────────────────────────────────────────

/** Records HTTP request duration and count for every request. */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = process.hrtime.bigint();
  res.on('finish', () => {
    const durationS = Number(process.hrtime.bigint() - start) / 1e9;
    const route = routePath(req);
    const labels = { method: req.method, route, status_code: String(res.statusCode) };
    httpRequestDuration.observe(labels, durationS);
    httpRequestsTotal.inc(labels);
  });
  next();
}

/** Matched route pattern, falling back to the raw path for unmatched requests. */
function routePath(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return route.path;
  }
  return req.path;
}

/** Handler for GET /metrics, the Prometheus scrape endpoint. */
export async function metricsHandler(_req: Request, res: Response) {
  res.set('Content-Type', metricsRegistry.contentType);
  res.end(await metricsRegistry.metrics());
}
