/**
 * Shared CLI utilities
 */

import { loadConfig } from "../config/index.js";
import { logger } from "../lib/index.js";
import { createRuntime } from "../runtime.js";

import { formatError } from "./formatters.js";

import type { Command } from "commander";
import type { Ora } from "ora";
import type { Runtime } from "../runtime.js";

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  dataDir?: string;
  corpus?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Read global options from any subcommand
 */
export function globalOptions(command: Command): GlobalOptions {
  const options = command.optsWithGlobals<Record<string, unknown>>();
  return {
    dataDir: typeof options["dataDir"] === "string" ? options["dataDir"] : undefined,
    corpus: typeof options["corpus"] === "string" ? options["corpus"] : undefined,
    verbose: Boolean(options["verbose"]),
    quiet: Boolean(options["quiet"]),
  };
}

/**
 * Load configuration, apply logging flags and build the runtime
 */
export function buildRuntime(options: GlobalOptions): Runtime {
  const config = loadConfig({
    overrides: { dataDir: options.dataDir, corpusPath: options.corpus },
  });

  if (options.quiet === true) {
    logger.configure({ level: "error" });
  } else if (options.verbose === true) {
    logger.configure({ level: "debug" });
  } else {
    logger.configure({ level: config.logLevel });
  }

  return createRuntime(config);
}

/**
 * Parse a positive integer option
 */
export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Print an error and exit non-zero
 */
export function exitWithError(error: unknown, spinner?: Ora | null): never {
  spinner?.fail();
  console.error(formatError(error instanceof Error ? error : new Error(String(error))));
  process.exit(1);
}
