/**
 * Command-line application: resolves settings, builds the scene and renders it.
 */

import { performance } from "perf_hooks";
import { Camera } from "./camera";
import { assertCameraFrame, parseCliArgs, usage } from "./cli";
import { config, mergeCameraConfig, readEnvOverrides } from "./config";
import { RethrownError, UsageError } from "./errors";
import { fileSink, PpmWriter, stdoutSink, type TextSink } from "./image";
import { LogLevel, Logger } from "./logger";
import { defaultRandom, seededRandom } from "./random";
import { getScene, listScenes, type SceneDef } from "./scene";
import "./scenes";

export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = typeof ExitCode[keyof typeof ExitCode];

export interface AppContext {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  /** Text output for help and listings. */
  print: (line: string) => void;
  /** Where the image goes when no output file is given. */
  openStdout: () => TextSink;
  openFile: (path: string) => TextSink;
}

export function defaultContext(): AppContext {
  return {
    env: process.env,
    logger: Logger.getInstance(),
    print: (line) => console.log(line),
    openStdout: stdoutSink,
    openFile: fileSink,
  };
}

export function run(argv: string[], ctx: AppContext = defaultContext()): ExitCode {
  const { logger } = ctx;
  const env = readEnvOverrides(ctx.env);
  const parsed = parseCliArgs(argv);

  logger.setLogLevel(parsed.quiet ? LogLevel.ERROR : env.logLevel ?? config.logLevel);
  for (const name of env.ignored) {
    logger.warning(`Ignoring invalid value of ${name}='${ctx.env[name] ?? ""}'`);
  }

  if (parsed.help) {
    ctx.print(usage());
    return ExitCode.OK;
  }

  if (parsed.listScenes) {
    for (const scene of listScenes()) {
      ctx.print(`${scene.name.padEnd(16)} ${scene.description}`);
    }
    return ExitCode.OK;
  }

  let scene: SceneDef;
  try {
    scene = getScene(parsed.scene);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const random = parsed.seed === undefined ? defaultRandom : seededRandom(parsed.seed);
  const camera = new Camera(mergeCameraConfig(scene.camera, env.camera, parsed.camera), random);
  assertCameraFrame(camera);
  const world = scene.build(random);

  logger.debug(
    `Camera: lookFrom=${camera.lookFrom.join(",")} lookAt=${camera.lookAt.join(",")} vup=${camera.vup.join(",")} vfov=${camera.vfov} defocusAngle=${camera.defocusAngle} focusDist=${camera.focusDist}`
  );

  logger.info(
    `Rendering scene '${scene.name}' (${camera.imageWidth}x${camera.imageHeight}, spp=${camera.samplesPerPixel}, depth=${camera.maxDepth}, objects=${world.size}${parsed.seed === undefined ? "" : `, seed=${parsed.seed}`})`
  );

  let sink: TextSink;
  if (parsed.outputPath === undefined) {
    sink = ctx.openStdout();
  } else {
    try {
      sink = ctx.openFile(parsed.outputPath);
    } catch (error) {
      throw new RethrownError(`Failed to open '${parsed.outputPath}' for writing`, error);
    }
  }
  const target = parsed.outputPath ?? "stdout";

  const start = performance.now();
  try {
    camera.render(world, new PpmWriter(failFast(sink, target)), {
      onScanline: (remaining) => logger.scanlinesRemaining(remaining),
    });
  } finally {
    sink.close?.();
  }
  logger.done(performance.now() - start);

  if (parsed.outputPath !== undefined) {
    logger.info(`Saved image: ${parsed.outputPath}`);
  }
  return ExitCode.OK;
}

/** Turns a failed write into a fatal error that stops the render. */
function failFast(sink: TextSink, target: string): TextSink {
  return {
    write: (text) => {
      try {
        sink.write(text);
      } catch (error) {
        throw new RethrownError(`Failed to write image to ${target}`, error);
      }
    },
  };
}
