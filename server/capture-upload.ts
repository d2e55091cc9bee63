/**
 * @fileoverview Command-line capture uploader.
 *
 * Usage: capture-upload [api_url] [interval_seconds] [duration_seconds]
 * Positional arguments override UPLOAD_URL, UPLOAD_INTERVAL_MS and
 * UPLOAD_DURATION_S.
 */

import { createCameraService } from './camera-setup.js';
import { ConfigError, loadConfig } from './config.js';
import { flushLogs, initLogger, installConsoleCapture } from './file-logger.js';
import { CaptureUploadClient } from './upload-client.js';

initLogger('capture-upload');
installConsoleCapture();

function parseSeconds(name: string, value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(name, `invalid ${name} '${value}'. Must be a positive number of seconds`);
  }
  return seconds;
}

/** Best-effort reachability check against the API root; never fatal. */
async function probeApi(url: string, timeoutMs: number): Promise<void> {
  const root = url.replace(/\/capture\/?$/, '/');
  try {
    const response = await fetch(root, { signal: AbortSignal.timeout(timeoutMs) });
    console.log(`[Upload] API server responded: HTTP ${response.status}`);
  } catch (error) {
    console.warn(`[Upload] Could not reach API server (${error instanceof Error ? error.message : error}), continuing anyway`);
  }
}

async function main(argv: string[]): Promise<number> {
  if (argv.includes('-h') || argv.includes('--help')) {
    console.log('Usage: capture-upload [api_url] [interval_seconds] [duration_seconds]');
    return 0;
  }

  const config = loadConfig();
  const [urlArg, intervalArg, durationArg] = argv;
  const url = urlArg ?? config.upload.url;
  const intervalMs = intervalArg ? parseSeconds('interval', intervalArg) * 1000 : config.upload.intervalMs;
  const durationMs = durationArg ? parseSeconds('duration', durationArg) * 1000 : config.upload.durationMs;

  console.log(`[Upload] API URL: ${url}`);
  console.log(`[Upload] Duration: ${durationMs ? `${durationMs / 1000}s` : 'unlimited (Ctrl+C to stop)'}`);
  await probeApi(url, config.upload.timeoutMs);

  const camera = createCameraService(config);
  await camera.start();

  const client = new CaptureUploadClient({
    url,
    intervalMs,
    workers: config.upload.workers,
    timeoutMs: config.upload.timeoutMs,
    capture: () => camera.captureJpeg(),
  });
  client.start();

  await new Promise<void>((resolve) => {
    const timer = durationMs ? setTimeout(resolve, durationMs) : null;
    process.once('SIGINT', () => {
      if (timer) clearTimeout(timer);
      resolve();
    });
  });

  const stats = await client.stop();
  await camera.stop();
  console.log(`[Upload] Total images captured: ${stats.captured}`);
  return 0;
}

main(process.argv.slice(2))
  .catch((error: unknown) => {
    console.error(`[Upload] ${error instanceof Error ? error.message : error}`);
    return 1;
  })
  .then(async (code) => {
    await flushLogs();
    process.exit(code);
  });
