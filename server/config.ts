/**
 * @fileoverview Environment-driven configuration for the camera service and clients.
 *
 * Every setting has a default; environment variables override it. Numeric
 * values are validated once here so the rest of the code can trust them.
 */

export type FrameSourceKind = 'ffmpeg' | 'test-pattern';
export type StreamClientMode = 'save' | 'images' | 'count';

export const FRAME_SOURCE_KINDS: readonly FrameSourceKind[] = ['ffmpeg', 'test-pattern'];
export const STREAM_CLIENT_MODES: readonly StreamClientMode[] = ['save', 'images', 'count'];

export interface CameraConfig {
  source: FrameSourceKind;
  /** Executable that writes MJPEG to stdout (ffmpeg-compatible arguments). */
  command: string;
  /** V4L2 device path. */
  device: string;
  width: number;
  height: number;
  fps: number;
  warmupMs: number;
}

export interface CompressionConfig {
  /** Use the adaptive compressor for compressed output; otherwise a fixed quality. */
  adaptive: boolean;
  budgetKb: number;
  defaultQuality: number;
  grayscaleQuality: number;
  basicQuality: number;
}

export interface StreamingConfig {
  frameDelayMs: number;
  compressedFrameDelayMs: number;
  retryDelayMs: number;
  /** Pacing of the raw MJPEG TCP stream. */
  rawIntervalMs: number;
}

export interface StreamClientConfig {
  host: string;
  port: number;
  mode: StreamClientMode;
  output?: string;
  maxImages: number;
}

export interface UploadConfig {
  url: string;
  intervalMs: number;
  workers: number;
  timeoutMs: number;
  /** Stop after this long; unset runs until interrupted. */
  durationMs?: number;
}

export interface AppConfig {
  host: string;
  httpPort: number;
  devicePort: number;
  rawStreamPort: number;
  display: { width: number; height: number };
  camera: CameraConfig;
  compression: CompressionConfig;
  streaming: StreamingConfig;
  client: StreamClientConfig;
  upload: UploadConfig;
}

/** Raised when an environment variable holds an unusable value. */
export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  { min = -Infinity, max = Infinity, integer = true }: { min?: number; max?: number; integer?: boolean } = {}
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ConfigError(name, `expected ${integer ? 'an integer' : 'a number'}, got '${raw}'`);
  }
  if (value < min || value > max) {
    throw new ConfigError(name, `${value} is outside [${min}, ${max}]`);
  }
  return value;
}

function readPort(env: Env, name: string, fallback: number): number {
  return readNumber(env, name, fallback, { min: 0, max: 65535 });
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name];
  if (!raw) return fallback;
  const match = choices.find(choice => choice === raw);
  if (!match) {
    throw new ConfigError(name, `expected one of ${choices.join(', ')}, got '${raw}'`);
  }
  return match;
}

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(raw.toLowerCase())) return false;
  throw new ConfigError(name, `expected a boolean, got '${raw}'`);
}

/**
 * Builds the configuration from environment variables.
 *
 * @throws ConfigError on malformed or out-of-range values.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const uploadSeconds = readNumber(env, 'UPLOAD_DURATION_S', 0, { min: 0, integer: false });

  return {
    host: env.HOST || '0.0.0.0',
    httpPort: readPort(env, 'PORT', 5000),
    devicePort: readPort(env, 'DEVICE_PORT', 10001),
    rawStreamPort: readPort(env, 'MJPEG_PORT', 10002),
    display: {
      width: readNumber(env, 'DISPLAY_WIDTH', 240, { min: 1, max: 4096 }),
      height: readNumber(env, 'DISPLAY_HEIGHT', 320, { min: 1, max: 4096 }),
    },
    camera: {
      source: readChoice(env, 'FRAME_SOURCE', FRAME_SOURCE_KINDS, 'ffmpeg'),
      command: env.CAPTURE_COMMAND || 'ffmpeg',
      device: env.CAMERA_DEVICE || '/dev/video0',
      width: readNumber(env, 'CAMERA_WIDTH', 320, { min: 1 }),
      height: readNumber(env, 'CAMERA_HEIGHT', 240, { min: 1 }),
      fps: readNumber(env, 'CAMERA_FPS', 15, { min: 1, max: 120 }),
      warmupMs: readNumber(env, 'CAMERA_WARMUP_MS', 1000, { min: 0 }),
    },
    compression: {
      adaptive: readFlag(env, 'ADAPTIVE_COMPRESSION', true),
      budgetKb: readNumber(env, 'COMPRESSED_BUDGET_KB', 8, { min: 1 }),
      defaultQuality: readNumber(env, 'JPEG_QUALITY', 85, { min: 1, max: 100 }),
      grayscaleQuality: readNumber(env, 'GRAYSCALE_QUALITY', 80, { min: 1, max: 100 }),
      basicQuality: readNumber(env, 'BASIC_COMPRESSED_QUALITY', 50, { min: 1, max: 100 }),
    },
    streaming: {
      frameDelayMs: readNumber(env, 'STREAM_FRAME_DELAY_MS', 100, { min: 0 }),
      compressedFrameDelayMs: readNumber(env, 'STREAM_COMPRESSED_DELAY_MS', 150, { min: 0 }),
      retryDelayMs: readNumber(env, 'STREAM_RETRY_DELAY_MS', 100, { min: 0 }),
      rawIntervalMs: readNumber(env, 'MJPEG_INTERVAL_MS', 100, { min: 0 }),
    },
    client: {
      host: env.STREAM_HOST || '127.0.0.1',
      port: readPort(env, 'STREAM_PORT', 10002),
      mode: readChoice(env, 'STREAM_MODE', STREAM_CLIENT_MODES, 'save'),
      output: env.STREAM_OUTPUT || undefined,
      maxImages: readNumber(env, 'STREAM_MAX_IMAGES', 10, { min: 0 }),
    },
    upload: {
      url: env.UPLOAD_URL || 'http://localhost:3000/api/capture',
      intervalMs: readNumber(env, 'UPLOAD_INTERVAL_MS', 500, { min: 1 }),
      workers: readNumber(env, 'UPLOAD_WORKERS', 2, { min: 1, max: 16 }),
      timeoutMs: readNumber(env, 'UPLOAD_TIMEOUT_MS', 5000, { min: 1 }),
      durationMs: uploadSeconds > 0 ? uploadSeconds * 1000 : undefined,
    },
  };
}
