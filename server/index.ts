/**
 * @fileoverview Camera server entry point.
 *
 * Starts one camera and exposes it three ways: the HTTP frame/stream API,
 * the display bitmap protocol, and a raw MJPEG TCP stream. All three share
 * the same {@link CameraService}, so captures are serialized across them.
 */

import { createCameraService } from './camera-setup.js';
import { ConfigError, loadConfig } from './config.js';
import { DeviceFrameServer } from './device-protocol.js';
import { flushLogs, initLogger, installConsoleCapture } from './file-logger.js';
import { createHttpApp, startHttpServer } from './http-server.js';
import { MjpegTcpServer } from './mjpeg-tcp-server.js';

initLogger('camera');
installConsoleCapture();

async function main(): Promise<void> {
  const config = loadConfig();
  const camera = createCameraService(config);
  await camera.start();

  const app = createHttpApp(camera, config.streaming);
  const { server: httpServer } = await startHttpServer(app, config.httpPort, config.host);

  const deviceServer = new DeviceFrameServer(camera, {
    port: config.devicePort,
    host: config.host,
    width: config.display.width,
    height: config.display.height,
  });
  await deviceServer.start();

  const rawServer = new MjpegTcpServer(() => camera.captureJpeg(), {
    port: config.rawStreamPort,
    host: config.host,
    intervalMs: config.streaming.rawIntervalMs,
  });
  await rawServer.start();

  const status = camera.getStatus();
  console.log(`[Server] Display endpoint: http://<host>:${config.httpPort}/frame`);
  console.log(`[Server] Advanced compression: ${status.advanced_compression ? 'ENABLED' : 'DISABLED'}`);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received, shutting down`);

    httpServer.closeAllConnections();
    await Promise.all([
      new Promise<void>((resolve) => httpServer.close(() => resolve())),
      deviceServer.stop(),
      rawServer.stop(),
    ]);
    await camera.stop();
    console.log('[Server] Camera server shutdown complete');
    await flushLogs();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('[Server] Shutdown failed:', error);
          process.exit(1);
        });
    });
  }
}

main().catch(async (error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[Server] Invalid configuration: ${error.message}`);
  } else {
    console.error('[Server] Failed to start:', error);
  }
  await flushLogs();
  process.exit(1);
});
