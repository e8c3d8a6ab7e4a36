/**
 * Configuration Management
 *
 * Reads `relabel.config.json` from the working directory, applies
 * environment overrides and resolves the data layout.
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";

import { z } from "zod";

import { DEFAULT_SOFTMAX_OPTIONS, DEFAULT_TFIDF_OPTIONS } from "../classifier/index.js";
import { ConfigError } from "../lib/errors.js";

export const CONFIG_FILE = "relabel.config.json";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/**
 * Configuration schema
 */
export const ConfigSchema = z.object({
  dataDir: z.string().min(1).default("relabel-data"),
  /** Defaults to `<dataDir>/corpus.json` */
  corpusPath: z.string().min(1).optional(),
  feedbackWeight: z.number().int().nonnegative().default(1),
  port: z.number().int().min(1).max(65535).default(8000),
  logLevel: LogLevelSchema.default("info"),
  vectorizer: z
    .object({
      maxFeatures: z.number().int().positive().default(DEFAULT_TFIDF_OPTIONS.maxFeatures),
      ngramRange: z
        .tuple([z.number().int().positive(), z.number().int().positive()])
        .default(DEFAULT_TFIDF_OPTIONS.ngramRange),
      minDf: z.number().int().nonnegative().default(DEFAULT_TFIDF_OPTIONS.minDf),
      maxDf: z.number().gt(0).lte(1).default(DEFAULT_TFIDF_OPTIONS.maxDf),
    })
    .default({}),
  classifier: z
    .object({
      c: z.number().positive().default(DEFAULT_SOFTMAX_OPTIONS.c),
      maxIter: z.number().int().positive().default(DEFAULT_SOFTMAX_OPTIONS.maxIter),
      learningRate: z.number().positive().default(DEFAULT_SOFTMAX_OPTIONS.learningRate),
    })
    .default({}),
});

export type ConfigFile = z.input<typeof ConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Where each kind of state lives
 */
export interface DataLayout {
  dataDir: string;
  corpusPath: string;
  modelsDir: string;
  feedbackPath: string;
  metricsDir: string;
}

/**
 * Fully resolved configuration
 */
export interface ResolvedConfig extends Omit<Config, "dataDir" | "corpusPath"> {
  paths: DataLayout;
}

/**
 * Resolve the data layout under a data directory
 */
export function resolveLayout(dataDir: string, corpusPath?: string): DataLayout {
  const root = resolve(dataDir);
  return {
    dataDir: root,
    corpusPath: corpusPath !== undefined ? resolve(corpusPath) : join(root, "corpus.json"),
    modelsDir: join(root, "models"),
    feedbackPath: join(root, "feedback", "feedback.jsonl"),
    metricsDir: join(root, "metrics"),
  };
}

function readConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    return {};
  }
  try {
    return JSON.parse(readFileSync(path, "utf-8")) as unknown;
  } catch (error) {
    throw new ConfigError(`${CONFIG_FILE} is not valid JSON`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port)) {
    throw new ConfigError(`RELABEL_PORT must be an integer, got "${value}"`);
  }
  return port;
}

/**
 * Load configuration. Environment variables take precedence over the file;
 * explicit overrides (CLI flags) take precedence over both.
 */
export function loadConfig(
  options: { cwd?: string; env?: NodeJS.ProcessEnv; overrides?: Partial<ConfigFile> } = {}
): ResolvedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const fileValue = readConfigFile(join(cwd, CONFIG_FILE));
  if (typeof fileValue !== "object" || fileValue === null || Array.isArray(fileValue)) {
    throw new ConfigError(`${CONFIG_FILE} must contain a JSON object`);
  }

  const fromEnv: Partial<ConfigFile> = {};
  if (env["RELABEL_DATA_DIR"]) fromEnv.dataDir = env["RELABEL_DATA_DIR"];
  if (env["RELABEL_PORT"]) fromEnv.port = parsePort(env["RELABEL_PORT"]);
  if (env["RELABEL_LOG_LEVEL"]) {
    const level = LogLevelSchema.safeParse(env["RELABEL_LOG_LEVEL"]);
    if (!level.success) {
      throw new ConfigError(`RELABEL_LOG_LEVEL must be one of ${LogLevelSchema.options.join(", ")}`);
    }
    fromEnv.logLevel = level.data;
  }

  // Unset CLI flags arrive as undefined and must not mask file or env values
  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined)
  );

  const result = ConfigSchema.safeParse({ ...fileValue, ...fromEnv, ...overrides });
  if (!result.success) {
    throw new ConfigError("Invalid configuration", { issues: result.error.issues });
  }

  const { dataDir, corpusPath, ...rest } = result.data;
  return {
    ...rest,
    paths: resolveLayout(resolve(cwd, dataDir), corpusPath !== undefined ? resolve(cwd, corpusPath) : undefined),
  };
}
