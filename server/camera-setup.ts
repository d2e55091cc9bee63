/**
 * @fileoverview Builds a {@link CameraService} from configuration.
 */

import { AdaptiveCompressor } from './adaptive-compressor.js';
import { CameraService, type CompressionCapability, type FrameSource } from './camera.js';
import type { AppConfig } from './config.js';
import { JimpImageEncoder } from './jimp-encoder.js';
import { MjpegProcessSource } from './mjpeg-process-source.js';
import { TestPatternSource } from './test-pattern-source.js';

export function createFrameSource(config: AppConfig): FrameSource {
  const { camera } = config;
  if (camera.source === 'test-pattern') {
    return new TestPatternSource(camera.width, camera.height);
  }
  return new MjpegProcessSource({
    command: camera.command,
    device: camera.device,
    width: camera.width,
    height: camera.height,
    fps: camera.fps,
    warmupMs: camera.warmupMs,
  });
}

/** Resolves the compressed-output capability once, at startup. */
export function createCompression(config: AppConfig, encoder: JimpImageEncoder): CompressionCapability {
  return config.compression.adaptive
    ? { kind: 'adaptive', compressor: new AdaptiveCompressor(encoder), budgetBytes: config.compression.budgetKb * 1024 }
    : { kind: 'basic', quality: config.compression.basicQuality };
}

export function createCameraService(config: AppConfig, source: FrameSource = createFrameSource(config)): CameraService {
  const encoder = new JimpImageEncoder();
  return new CameraService(source, {
    encoder,
    compression: createCompression(config, encoder),
    defaultQuality: config.compression.defaultQuality,
    grayscaleQuality: config.compression.grayscaleQuality,
  });
}
