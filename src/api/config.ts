import { readFile } from 'node:fs/promises';

import { DEFAULT_FRAME_INTERVAL } from '../constants/media.js';
import { ConfigurationError } from '../lib/error.js';

/**
 * Stream quality requested from a camera.
 */
export enum VideoQuality {
  LOW = 1,
  MEDIUM = 2,
  HIGH = 3,
}

/**
 * Camera settings consumed by the decoder and the stream session.
 */
export interface CameraConfig {
  /** Minimum spacing between two snapshots (ms) */
  frameInterval: number;

  /** Quality per camera id */
  cameraQualities: Record<string, VideoQuality>;

  /** Quality of cameras without an entry in {@link cameraQualities} */
  defaultQuality: VideoQuality;
}

/**
 * Configuration used when nothing is configured.
 */
export const DEFAULT_CAMERA_CONFIG: Readonly<CameraConfig> = Object.freeze({
  frameInterval: DEFAULT_FRAME_INTERVAL,
  cameraQualities: {},
  defaultQuality: VideoQuality.MEDIUM,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseQuality(value: unknown, field: string): VideoQuality {
  switch (value) {
    case VideoQuality.LOW:
      return VideoQuality.LOW;
    case VideoQuality.MEDIUM:
      return VideoQuality.MEDIUM;
    case VideoQuality.HIGH:
      return VideoQuality.HIGH;
    default:
      throw new ConfigurationError(`Invalid ${field}: ${String(value)} (must be 1, 2, or 3)`);
  }
}

/**
 * Validate raw camera configuration.
 *
 * Accepts camelCase and snake_case keys (`frame_interval`, `camera_qualities`,
 * `default_quality`). Missing keys take their defaults.
 *
 * @param raw - Parsed JSON or an options object
 *
 * @returns Validated configuration
 *
 * @throws {ConfigurationError} If a value has the wrong type or is out of range
 *
 * @example
 * ```typescript
 * const config = parseCameraConfig({
 *   frame_interval: 500,
 *   camera_qualities: { 'camera-1': 3 },
 *   default_quality: 2,
 * });
 * ```
 */
export function parseCameraConfig(raw: unknown): CameraConfig {
  if (raw === undefined || raw === null) {
    return { ...DEFAULT_CAMERA_CONFIG, cameraQualities: {} };
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError('Camera configuration must be an object');
  }

  const frameInterval = raw.frameInterval ?? raw.frame_interval ?? DEFAULT_CAMERA_CONFIG.frameInterval;
  if (typeof frameInterval !== 'number' || !Number.isFinite(frameInterval) || frameInterval <= 0) {
    throw new ConfigurationError(`Invalid frame_interval: ${String(frameInterval)} (must be a positive number of ms)`);
  }

  const defaultQuality = parseQuality(raw.defaultQuality ?? raw.default_quality ?? DEFAULT_CAMERA_CONFIG.defaultQuality, 'default_quality');

  const qualities = raw.cameraQualities ?? raw.camera_qualities ?? {};
  if (!isRecord(qualities)) {
    throw new ConfigurationError('camera_qualities must be a dictionary');
  }

  const cameraQualities: Record<string, VideoQuality> = {};
  for (const [cameraId, quality] of Object.entries(qualities)) {
    cameraQualities[cameraId] = parseQuality(quality, `quality for camera ${cameraId}`);
  }

  return { frameInterval, cameraQualities, defaultQuality };
}

/**
 * Read and validate a JSON camera configuration file.
 *
 * @param path - Path of the JSON file
 *
 * @returns Validated configuration
 *
 * @throws {ConfigurationError} If the file cannot be read or is invalid
 */
export async function loadCameraConfig(path: string): Promise<CameraConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read camera configuration ${path}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Camera configuration ${path} is not valid JSON`, { cause: error });
  }

  return parseCameraConfig(raw);
}

/**
 * Quality to request from a camera.
 *
 * @param config - Camera configuration
 *
 * @param cameraId - Camera id
 *
 * @returns Configured quality, or the default quality
 */
export function resolveCameraQuality(config: CameraConfig, cameraId: string): VideoQuality {
  const quality = Object.hasOwn(config.cameraQualities, cameraId) ? config.cameraQualities[cameraId] : undefined;
  return quality ?? config.defaultQuality;
}
