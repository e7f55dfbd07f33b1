/**
 * Command-line flags for the renderer.
 */

import type { CameraConfig } from "./camera";
import { config } from "./config";
import { UsageError } from "./errors";
import { cross, nearZero, normalize, sub, type Vec3 } from "./vec3";

export interface ParsedArgs {
  help: boolean;
  listScenes: boolean;
  scene: string;
  /** Only the camera settings given on the command line. */
  camera: CameraConfig;
  seed?: number;
  /** Image file; stdout when absent. */
  outputPath?: string;
  quiet: boolean;
}

export function parseCliArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    help: false,
    listScenes: false,
    scene: config.scene,
    camera: {},
    quiet: false,
  };
  const camera = parsed.camera;

  for (let index = 0; index < args.length; index += 1) {
    const flag = args[index] ?? "";
    if (flag === "--") {
      // end of options; there are no positional arguments
      const extra = args[index + 1];
      if (extra !== undefined) {
        throw new UsageError(`Unexpected argument '${extra}'`);
      }
      break;
    }

    switch (flag) {
      case "--help":
      case "-h":
        parsed.help = true;
        break;
      case "--list-scenes":
        parsed.listScenes = true;
        break;
      case "--quiet":
      case "-q":
        parsed.quiet = true;
        break;
      case "--scene": {
        const value = consumeNextValue(args, flag, index).trim();
        if (!value) {
          throw new UsageError("--scene must be non-empty");
        }
        parsed.scene = value;
        index += 1;
        break;
      }
      case "--width": {
        camera.imageWidth = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 1);
        index += 1;
        break;
      }
      case "--aspect": {
        camera.aspectRatio = parseAspectRatio(consumeNextValue(args, flag, index), flag);
        index += 1;
        break;
      }
      case "--spp": {
        camera.samplesPerPixel = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 1);
        index += 1;
        break;
      }
      case "--depth": {
        camera.maxDepth = parseIntAtLeast(consumeNextValue(args, flag, index), flag, 0);
        index += 1;
        break;
      }
      case "--fov": {
        camera.vfov = parseFloatInRange(consumeNextValue(args, flag, index), flag, 0, 180);
        index += 1;
        break;
      }
      case "--look-from": {
        camera.lookFrom = parseVec3(consumeNextValue(args, flag, index), flag);
        index += 1;
        break;
      }
      case "--look-at": {
        camera.lookAt = parseVec3(consumeNextValue(args, flag, index), flag);
        index += 1;
        break;
      }
      case "--vup": {
        camera.vup = parseVec3(consumeNextValue(args, flag, index), flag);
        index += 1;
        break;
      }
      case "--defocus-angle": {
        camera.defocusAngle = parseFloatAtLeast(consumeNextValue(args, flag, index), flag, 0);
        index += 1;
        break;
      }
      case "--focus-dist": {
        camera.focusDist = parseFloatInRange(consumeNextValue(args, flag, index), flag, 0, Infinity);
        index += 1;
        break;
      }
      case "--seed": {
        parsed.seed = parseStrictInteger(consumeNextValue(args, flag, index), flag);
        index += 1;
        break;
      }
      case "--output":
      case "-o": {
        parsed.outputPath = consumeNextValue(args, flag, index);
        index += 1;
        break;
      }
      default:
        throw new UsageError(`Unknown CLI argument '${flag}'`);
    }
  }

  return parsed;
}

export type CameraFrame = Required<Pick<CameraConfig, "lookFrom" | "lookAt" | "vup">>;

/** Rejects camera placements that leave no well-defined view basis. */
export function assertCameraFrame(frame: CameraFrame): void {
  const view = sub(frame.lookFrom, frame.lookAt);
  if (nearZero(view)) {
    throw new UsageError("--look-from and --look-at must be different points");
  }
  if (nearZero(cross(frame.vup, normalize(view)))) {
    throw new UsageError("--vup must not be parallel to the view direction");
  }
}

// =============================================================================
// Value Parsers
// =============================================================================

function consumeNextValue(args: string[], flag: string, index: number): string {
  const value = args[index + 1];
  if (value === undefined) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

function parseIntAtLeast(value: string, flag: string, min: number): number {
  const parsed = parseStrictInteger(value, flag);
  if (parsed < min) {
    throw new UsageError(`${flag} must be an integer >= ${min}, got '${value}'`);
  }
  return parsed;
}

function parseFloatAtLeast(value: string, flag: string, min: number): number {
  const parsed = parseStrictFiniteFloat(value, flag);
  if (parsed < min) {
    throw new UsageError(`${flag} must be a number >= ${min}, got '${value}'`);
  }
  return parsed;
}

function parseFloatInRange(
  value: string,
  flag: string,
  minExclusive: number,
  maxExclusive: number
): number {
  const parsed = parseStrictFiniteFloat(value, flag);
  if (parsed <= minExclusive || parsed >= maxExclusive) {
    throw new UsageError(
      `${flag} must be in (${minExclusive}, ${maxExclusive}), got '${value}'`
    );
  }
  return parsed;
}

/** Accepts `16/9` style ratios as well as plain numbers. */
function parseAspectRatio(value: string, flag: string): number {
  const [width, height, ...rest] = value.split("/");
  if (width !== undefined && height !== undefined && rest.length === 0) {
    return (
      parseFloatInRange(width, flag, 0, Infinity) / parseFloatInRange(height, flag, 0, Infinity)
    );
  }
  return parseFloatInRange(value, flag, 0, Infinity);
}

function parseVec3(raw: string, flag: string): Vec3 {
  const tokens = raw.split(",");
  const [x, y, z] = tokens;
  if (tokens.length !== 3 || x === undefined || y === undefined || z === undefined) {
    throw new UsageError(`${flag} expects 'x,y,z', got '${raw}'`);
  }
  return [
    parseStrictFiniteFloat(x, flag),
    parseStrictFiniteFloat(y, flag),
    parseStrictFiniteFloat(z, flag),
  ];
}

function parseStrictInteger(value: string, flag: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new UsageError(`${flag} must be an integer, got '${value}'`);
  }

  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new UsageError(`${flag} must be a safe integer, got '${value}'`);
  }
  return parsed;
}

function parseStrictFiniteFloat(value: string, flag: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/.test(trimmed)) {
    throw new UsageError(`${flag} must be a finite number, got '${value}'`);
  }

  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new UsageError(`${flag} must be a finite number, got '${value}'`);
  }
  return parsed;
}

// =============================================================================
// Usage
// =============================================================================

export function usage(): string {
  return `Usage: sphere-tracer [options] > image.ppm

Renders a scene with a path tracer and writes a plain PPM (P3) image.
Progress goes to stderr.

Options:
  --scene <name>             Scene to render (default: ${config.scene})
  --list-scenes              List the available scenes and exit
  --width <int>              Image width in pixels, >= 1
  --aspect <w/h>             Aspect ratio, e.g. 16/9 or 1.5
  --spp <int>                Samples per pixel, >= 1
  --depth <int>              Max bounces per sample, >= 0
  --fov <degrees>            Vertical field of view, (0, 180)
  --look-from <x,y,z>        Camera position
  --look-at <x,y,z>          Point the camera looks at
  --vup <x,y,z>              Camera up direction
  --defocus-angle <degrees>  Lens cone angle, >= 0 (0 disables depth of field)
  --focus-dist <float>       Distance to the plane of focus, > 0
  --seed <int>               Seed the sampler for a reproducible image
  -o, --output <path>        Write the image to a file instead of stdout
  -q, --quiet                Only log errors
  -h, --help                 Show this help

Environment:
  ${config.env.samplesPerPixel}, ${config.env.maxDepth}, ${config.env.imageWidth}   Positive integer defaults for --spp, --depth, --width
  ${config.env.logLevel}                           debug, info, warn, error or silent

Example:
  sphere-tracer --scene materials --width 400 --spp 20 -o out.ppm`;
}
