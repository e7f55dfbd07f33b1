/**
 * Render configuration - defaults and environment overrides.
 *
 * Precedence, lowest first: camera defaults, the scene's own camera, the
 * environment, command-line flags.
 */

import type { CameraConfig } from "./camera";
import { LogLevel, parseLogLevel } from "./logger";

// =============================================================================
// Defaults
// =============================================================================

const defaultLogLevel: LogLevel = LogLevel.INFO;

export const config = {
  scene: "random-spheres",
  logLevel: defaultLogLevel,
  env: {
    samplesPerPixel: "RENDER_SPP",
    maxDepth: "RENDER_MAX_DEPTH",
    imageWidth: "RENDER_WIDTH",
    logLevel: "RENDER_LOG_LEVEL",
  },
};

// =============================================================================
// Environment
// =============================================================================

export interface EnvOverrides {
  camera: CameraConfig;
  logLevel?: LogLevel;
  /** Variables that were set but could not be used. */
  ignored: string[];
}

export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EnvOverrides {
  const camera: CameraConfig = {};
  const ignored: string[] = [];

  const readInt = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === "") return undefined;
    const parsed = parsePositiveInt(raw);
    if (parsed === undefined) ignored.push(name);
    return parsed;
  };

  const samplesPerPixel = readInt(config.env.samplesPerPixel);
  if (samplesPerPixel !== undefined) camera.samplesPerPixel = samplesPerPixel;
  const maxDepth = readInt(config.env.maxDepth);
  if (maxDepth !== undefined) camera.maxDepth = maxDepth;
  const imageWidth = readInt(config.env.imageWidth);
  if (imageWidth !== undefined) camera.imageWidth = imageWidth;

  let logLevel: LogLevel | undefined;
  const rawLevel = env[config.env.logLevel];
  if (rawLevel) {
    logLevel = parseLogLevel(rawLevel);
    if (logLevel === undefined) ignored.push(config.env.logLevel);
  }

  return { camera, logLevel, ignored };
}

function parsePositiveInt(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) && parsed >= 1 ? parsed : undefined;
}

/**
 * Later layers win. Layers carry only the keys they set, so a missing key
 * falls through to the layer below.
 */
export function mergeCameraConfig(...layers: CameraConfig[]): CameraConfig {
  return layers.reduce<CameraConfig>((merged, layer) => ({ ...merged, ...layer }), {});
}
