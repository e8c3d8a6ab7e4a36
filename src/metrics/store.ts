import { rm } from "fs/promises";
import { join } from "path";

import { ArtifactError, NotFoundError } from "../lib/errors.js";
import { readJsonFile, writeFileAtomic } from "../lib/files.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";

import { MetricsRecordSchema } from "./types.js";

import type { Result } from "../lib/result.js";
import type { MetricsRecord, MetricsSummary } from "./types.js";

const log = logger.child("[metrics]");

/**
 * One metrics document per version under a metrics directory.
 * Holds no state between calls.
 */
export class MetricsStore {
  constructor(private readonly metricsDir: string) {}

  /**
   * Write metrics for a version
   */
  async persist(metrics: MetricsRecord, versionId: number): Promise<void> {
    const path = this.pathFor(versionId);
    await writeFileAtomic(path, JSON.stringify(metrics, null, 2));
    log.debug(`Metrics for v${versionId} saved to ${path}`);
  }

  /**
   * Read metrics for a version
   */
  async load(versionId: number): Promise<Result<MetricsRecord, NotFoundError>> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.pathFor(versionId));
    } catch (error) {
      log.debug(`Failed to read metrics for v${versionId}: ${error instanceof Error ? error.message : String(error)}`);
      throw new ArtifactError(`Metrics for v${versionId} are unreadable`, { artifact: "metrics", versionId });
    }
    if (raw === undefined) {
      return err(new NotFoundError(`Metrics for v${versionId} not found`, "metrics", versionId));
    }

    const parsed = MetricsRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ArtifactError(`Metrics for v${versionId} are malformed`, {
        artifact: "metrics",
        versionId,
        issues: parsed.error.issues,
      });
    }
    return ok(parsed.data);
  }

  /**
   * Headline metrics per version, omitting versions without stored metrics
   */
  async compare(versionIds: readonly number[]): Promise<Map<number, MetricsSummary>> {
    const comparison = new Map<number, MetricsSummary>();
    for (const versionId of versionIds) {
      const result = await this.load(versionId);
      if (!result.success) continue;
      const { accuracy, f1Macro, f1Weighted } = result.data;
      comparison.set(versionId, { accuracy, f1Macro, f1Weighted });
    }
    return comparison;
  }

  /**
   * Delete the metrics of a version that was rolled back; a no-op when absent
   */
  async remove(versionId: number): Promise<void> {
    await rm(this.pathFor(versionId), { force: true });
  }

  private pathFor(versionId: number): string {
    return join(this.metricsDir, `metrics_v${versionId}.json`);
  }
}

/**
 * Create a metrics store rooted at a directory
 */
export function createMetricsStore(metricsDir: string): MetricsStore {
  return new MetricsStore(metricsDir);
}
