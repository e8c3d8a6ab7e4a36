/**
 * Feedback Store
 *
 * Append-only JSON Lines log of human-corrected labels.
 */

import { appendFile, mkdir, readFile } from "fs/promises";
import { dirname } from "path";

import { ValidationError } from "../lib/errors.js";
import { isNotFound } from "../lib/files.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";

import { FeedbackInputSchema, FeedbackRecordSchema } from "./types.js";

import type { Result } from "../lib/result.js";
import type { FeedbackInput, FeedbackRecord, FeedbackSummary, TrainingSample } from "./types.js";

const log = logger.child("[feedback]");

/**
 * Append-only feedback log.
 *
 * Appends from one store instance are queued, so the log order is the
 * acceptance order. Reads never lock.
 */
export class FeedbackStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Validate, timestamp and append a record
   */
  append(input: FeedbackInput): Promise<Result<FeedbackRecord, ValidationError>> {
    const validation = FeedbackInputSchema.safeParse(input);
    if (!validation.success) {
      const message = validation.error.issues[0]?.message ?? "Invalid feedback";
      return Promise.resolve(err(new ValidationError(message, { issues: validation.error.issues })));
    }

    const write = this.queue.then(async () => {
      const record: FeedbackRecord = {
        ...validation.data,
        timestamp: this.now().toISOString(),
      };
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(record) + "\n", "utf-8");
      log.debug(`Recorded feedback labelled "${record.humanLabel}"`);
      return ok(record);
    });

    // Keep the queue alive after a failed write; the caller still sees the rejection
    this.queue = write.catch(() => undefined);
    return write;
  }

  /**
   * All records in insertion order; empty when nothing has been recorded
   */
  async loadAll(): Promise<FeedbackRecord[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const records: FeedbackRecord[] = [];
    const lines = content.split("\n");
    lines.forEach((line, index) => {
      if (line.trim() === "") return;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        log.warn(`Skipping unparseable feedback entry at line ${index + 1}`);
        return;
      }

      const result = FeedbackRecordSchema.safeParse(parsed);
      if (!result.success) {
        log.warn(`Skipping malformed feedback entry at line ${index + 1}`);
        return;
      }
      records.push(result.data);
    });

    return records;
  }

  /**
   * (text, humanLabel) pairs usable for retraining
   */
  async projectForTraining(): Promise<TrainingSample[]> {
    return projectForTraining(await this.loadAll());
  }
}

/**
 * Drop records with blank text or label
 */
export function projectForTraining(records: readonly FeedbackRecord[]): TrainingSample[] {
  return records
    .filter((record) => record.text.trim() !== "" && record.humanLabel.trim() !== "")
    .map((record) => ({ text: record.text, humanLabel: record.humanLabel }));
}

/**
 * Summarize a feedback log
 */
export function summarize(records: readonly FeedbackRecord[]): FeedbackSummary {
  // Label names come from raters; Maps keep names like "constructor" from hitting Object.prototype
  const byLabel = new Map<string, number>();
  const byVersion = new Map<string, number>();
  let corrections = 0;

  for (const record of records) {
    if (record.modelPrediction !== record.humanLabel) {
      corrections++;
    }
    byLabel.set(record.humanLabel, (byLabel.get(record.humanLabel) ?? 0) + 1);
    const version = record.sourceModelVersion === null ? "none" : `v${record.sourceModelVersion}`;
    byVersion.set(version, (byVersion.get(version) ?? 0) + 1);
  }

  return {
    total: records.length,
    corrections,
    byLabel: Object.fromEntries(byLabel),
    byVersion: Object.fromEntries(byVersion),
    firstAt: records[0]?.timestamp ?? null,
    lastAt: records[records.length - 1]?.timestamp ?? null,
  };
}

/**
 * Generate a markdown feedback report
 */
export function generateReport(summary: FeedbackSummary): string {
  const lines: string[] = [
    "# Feedback Report",
    "",
    `Total records: ${summary.total}`,
    `Corrections: ${summary.corrections}`,
    `First: ${summary.firstAt ?? "-"}`,
    `Last: ${summary.lastAt ?? "-"}`,
    "",
  ];

  const labels = Object.entries(summary.byLabel).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (labels.length > 0) {
    lines.push("## By Label");
    lines.push("");
    for (const [label, count] of labels) {
      lines.push(`- ${label}: ${count}`);
    }
    lines.push("");
  }

  const versions = Object.entries(summary.byVersion).sort((a, b) => a[0].localeCompare(b[0]));
  if (versions.length > 0) {
    lines.push("## By Model Version");
    lines.push("");
    for (const [version, count] of versions) {
      lines.push(`- ${version}: ${count}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

/**
 * Create a store backed by a JSON Lines file
 */
export function createFeedbackStore(filePath: string): FeedbackStore {
  return new FeedbackStore(filePath);
}
