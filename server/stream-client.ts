/**
 * @fileoverview Command-line receiver for the raw MJPEG TCP stream.
 *
 * Usage: stream-client [server_ip] [save|images|count] [filename]
 * Positional arguments override STREAM_HOST, STREAM_MODE and STREAM_OUTPUT.
 */

import { isIP } from 'net';
import { ConfigError, loadConfig, STREAM_CLIENT_MODES, type StreamClientMode } from './config.js';
import { flushLogs, initLogger, installConsoleCapture } from './file-logger.js';
import { MjpegStreamClient } from './mjpeg-client.js';

initLogger('stream-client');
installConsoleCapture();

function usage(): string {
  return [
    'Usage: stream-client [server_ip] [mode] [filename]',
    '',
    'Modes:',
    '  save    - Save as MJPEG file (default)',
    '  images  - Save the first frames as individual JPEGs',
    '  count   - Just receive and count frames',
  ].join('\n');
}

function parseMode(value: string): StreamClientMode {
  const mode = STREAM_CLIENT_MODES.find(m => m === value);
  if (!mode) {
    throw new ConfigError('mode', `invalid mode '${value}'. Use ${STREAM_CLIENT_MODES.join(', ')}`);
  }
  return mode;
}

async function main(argv: string[]): Promise<number> {
  if (argv.includes('-h') || argv.includes('--help')) {
    console.log(usage());
    return 0;
  }

  const config = loadConfig().client;
  const [hostArg, modeArg, fileArg] = argv;
  const host = hostArg ?? config.host;
  if (isIP(host) === 0) {
    console.error(`[StreamClient] '${host}' is not a valid IP address`);
    return 1;
  }
  const mode = modeArg ? parseMode(modeArg) : config.mode;

  const client = new MjpegStreamClient({
    host,
    port: config.port,
    mode,
    output: fileArg ?? config.output,
    maxImages: config.maxImages,
  });

  process.once('SIGINT', () => {
    client.stop().catch((error: unknown) => {
      console.error('[StreamClient] Stop failed:', error);
    });
  });

  const summary = await client.run();
  if (summary.outputPath) {
    console.log('[StreamClient] To view the saved stream:');
    console.log(`  vlc ${summary.outputPath}`);
    console.log(`  ffplay ${summary.outputPath}`);
  }
  return summary.connected ? 0 : 1;
}

main(process.argv.slice(2))
  .catch((error: unknown) => {
    console.error(`[StreamClient] ${error instanceof Error ? error.message : error}`);
    return 1;
  })
  .then(async (code) => {
    await flushLogs();
    process.exit(code);
  });
