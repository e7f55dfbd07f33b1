#!/usr/bin/env node
/**
 * sphere-tracer - renders a sphere scene to a PPM image on stdout.
 */

import { ExitCode, run } from "./app";
import { RethrownError, UsageError } from "./errors";
import { Logger } from "./logger";

const logger = Logger.getInstance();

try {
  process.exitCode = run(process.argv.slice(2));
} catch (err) {
  if (err instanceof UsageError) {
    logger.error(err.message);
    logger.error("Run 'sphere-tracer --help' for usage.");
    process.exitCode = ExitCode.USAGE;
  } else if (err instanceof RethrownError) {
    logger.error(`${err.message}: ${err.original.message}`);
    process.exitCode = ExitCode.FAILURE;
  } else {
    logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exitCode = ExitCode.FAILURE;
  }
}
