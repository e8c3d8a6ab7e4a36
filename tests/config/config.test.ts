import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";

import { loadConfig, resolveLayout } from "@/config/index.js";
import { ConfigError } from "@/lib/errors.js";

import { createTempDir, removeTempDir } from "@tests/fixtures/corpus.js";

describe("loadConfig", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(cwd);
  });

  const writeConfig = (value: unknown): Promise<void> =>
    fs.writeFile(path.join(cwd, "relabel.config.json"), JSON.stringify(value));

  it("uses defaults without a config file", () => {
    const config = loadConfig({ cwd, env: {} });

    expect(config.port).toBe(8000);
    expect(config.feedbackWeight).toBe(1);
    expect(config.logLevel).toBe("info");
    expect(config.vectorizer).toEqual({ maxFeatures: 10000, ngramRange: [1, 2], minDf: 2, maxDf: 0.95 });
    expect(config.paths).toEqual({
      dataDir: path.join(cwd, "relabel-data"),
      corpusPath: path.join(cwd, "relabel-data", "corpus.json"),
      modelsDir: path.join(cwd, "relabel-data", "models"),
      feedbackPath: path.join(cwd, "relabel-data", "feedback", "feedback.jsonl"),
      metricsDir: path.join(cwd, "relabel-data", "metrics"),
    });
  });

  it("reads the config file relative to the working directory", async () => {
    await writeConfig({ dataDir: "state", corpusPath: "data/news.json", feedbackWeight: 2 });

    const config = loadConfig({ cwd, env: {} });

    expect(config.feedbackWeight).toBe(2);
    expect(config.paths.dataDir).toBe(path.join(cwd, "state"));
    expect(config.paths.corpusPath).toBe(path.join(cwd, "data", "news.json"));
  });

  it("lets the environment override the file", async () => {
    await writeConfig({ port: 9000, logLevel: "warn" });

    const config = loadConfig({ cwd, env: { RELABEL_PORT: "9100", RELABEL_LOG_LEVEL: "debug" } });

    expect(config.port).toBe(9100);
    expect(config.logLevel).toBe("debug");
  });

  it("lets explicit overrides win and ignores unset ones", async () => {
    await writeConfig({ feedbackWeight: 2 });

    const config = loadConfig({
      cwd,
      env: { RELABEL_DATA_DIR: "from-env" },
      overrides: { dataDir: "from-flag", feedbackWeight: undefined },
    });

    expect(config.paths.dataDir).toBe(path.join(cwd, "from-flag"));
    expect(config.feedbackWeight).toBe(2);
  });

  it("rejects invalid JSON", async () => {
    await fs.writeFile(path.join(cwd, "relabel.config.json"), "{ port: ");

    expect(() => loadConfig({ cwd, env: {} })).toThrow(ConfigError);
  });

  it("rejects a non-object document", async () => {
    await writeConfig([1, 2]);

    expect(() => loadConfig({ cwd, env: {} })).toThrow("relabel.config.json must contain a JSON object");
  });

  it("rejects out-of-range values", async () => {
    await writeConfig({ feedbackWeight: -1 });

    expect(() => loadConfig({ cwd, env: {} })).toThrow("Invalid configuration");
  });

  it("rejects a malformed port variable", () => {
    expect(() => loadConfig({ cwd, env: { RELABEL_PORT: "eighty" } })).toThrow(
      'RELABEL_PORT must be an integer, got "eighty"'
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ cwd, env: { RELABEL_LOG_LEVEL: "verbose" } })).toThrow(ConfigError);
  });
});

describe("resolveLayout", () => {
  it("keeps an explicit corpus path", () => {
    const layout = resolveLayout("/srv/relabel", "/data/corpus.json");

    expect(layout.corpusPath).toBe("/data/corpus.json");
    expect(layout.modelsDir).toBe(path.join("/srv/relabel", "models"));
  });
});
