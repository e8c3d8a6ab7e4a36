import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";

import { MetricsStore } from "@/metrics/index.js";
import { ModelRegistry } from "@/registry/index.js";
import { TrainingPipeline, alignLabels } from "@/training/index.js";
import { NoBaselineModelError, UnknownLabelError, VersionConflictError } from "@/lib/errors.js";

import {
  LABELS,
  createTempDir,
  createTestCorpus,
  createTestPipeline,
  fitTestModel,
  removeTempDir,
} from "@tests/fixtures/corpus.js";

import type { NotFoundError } from "@/lib/errors.js";
import type { Result } from "@/lib/result.js";
import type { MetricsRecord } from "@/metrics/index.js";

class FailingMetricsStore extends MetricsStore {
  override async persist(_metrics: MetricsRecord, _versionId: number): Promise<void> {
    throw new Error("disk full");
  }
}

class FailingPromoteRegistry extends ModelRegistry {
  override async promote(_versionId: number): Promise<Result<void, NotFoundError>> {
    throw new Error("pointer unwritable");
  }
}

describe("TrainingPipeline", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe("trainBaseline", () => {
    it("registers and promotes version 1", async () => {
      const { deps, pipeline } = createTestPipeline(dir);

      const result = await pipeline.trainBaseline();

      expect(result.versionId).toBe(1);
      expect(result.baselineVersion).toBeNull();
      expect(result.totalSamples).toBe(4);
      expect(result.metrics.accuracy).toBe(1);
      expect(await deps.registry.resolveCurrentVersion()).toEqual({ success: true, data: 1 });
      expect(await deps.registry.labelSchemaFor(1)).toEqual(LABELS);
    });

    it("persists metrics for version 1", async () => {
      const { deps, pipeline } = createTestPipeline(dir);

      const result = await pipeline.trainBaseline();

      expect(await deps.metrics.load(1)).toEqual({ success: true, data: result.metrics });
    });

    it("refuses to run on a non-empty registry", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();

      await expect(pipeline.trainBaseline()).rejects.toBeInstanceOf(VersionConflictError);
      expect(await deps.registry.listVersions()).toEqual([1]);
    });
  });

  describe("retrain", () => {
    it("fails without a baseline and registers nothing", async () => {
      const { deps, pipeline } = createTestPipeline(dir);

      await expect(pipeline.retrain()).rejects.toBeInstanceOf(NoBaselineModelError);
      expect(await deps.registry.listVersions()).toEqual([]);
    });

    it("combines the corpus with weighted feedback", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();
      await deps.feedback.append({ text: "text A", modelPrediction: "World", humanLabel: "Sports" });
      await deps.feedback.append({ text: "text B", modelPrediction: "Sports", humanLabel: "World" });

      const result = await pipeline.retrain({ feedbackWeight: 3 });

      expect(result).toMatchObject({
        versionId: 2,
        baselineVersion: 1,
        originalSamples: 4,
        feedbackSamples: 2,
        weightedFeedbackSamples: 6,
        totalSamples: 10,
        vectorizerReused: true,
      });
      expect(await deps.registry.resolveCurrentVersion()).toEqual({ success: true, data: 2 });
      expect(await deps.registry.listVersions()).toEqual([1, 2]);
      expect((await deps.metrics.load(2)).success).toBe(true);
    });

    it("trains on the original rows only at weight zero", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();
      await deps.feedback.append({ text: "text A", humanLabel: "Sports" });

      const result = await pipeline.retrain({ feedbackWeight: 0 });

      expect(result.feedbackSamples).toBe(1);
      expect(result.totalSamples).toBe(4);
    });

    it("reports no change when retraining on identical data", async () => {
      const { pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();

      const result = await pipeline.retrain();

      expect(result.feedbackSamples).toBe(0);
      expect(result.improvement).toEqual({ accuracy: 0, f1Macro: 0 });
    });

    it("increments from the current version", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();
      await pipeline.retrain();

      const result = await pipeline.retrain();

      expect(result.versionId).toBe(3);
      expect(result.baselineVersion).toBe(2);
      expect(await deps.registry.listVersions()).toEqual([1, 2, 3]);
    });

    it("accepts feedback labels with surrounding whitespace", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();
      await deps.feedback.append({ text: "derby win", humanLabel: " Sports " });

      const result = await pipeline.retrain();

      expect(result.feedbackSamples).toBe(1);
    });

    it("aborts on an unknown feedback label without registering", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();
      await deps.feedback.append({ text: "rain tomorrow", humanLabel: "Weather" });

      await expect(pipeline.retrain()).rejects.toBeInstanceOf(UnknownLabelError);
      expect(await deps.registry.listVersions()).toEqual([1]);
      expect(await deps.registry.resolveCurrentVersion()).toEqual({ success: true, data: 1 });
    });

    it("reuses the baseline vectorizer by default", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();
      await deps.feedback.append({ text: "quarterly profits", humanLabel: "Business" });

      await pipeline.retrain();

      const v1 = await deps.registry.loadVectorizer(1);
      const v2 = await deps.registry.loadVectorizer(2);
      expect(v2?.toJSON()).toEqual(v1?.toJSON());
    });

    it("fits a new vectorizer when asked", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();
      await deps.feedback.append({ text: "quarterly profits", humanLabel: "Business" });

      const result = await pipeline.retrain({ refitVectorizer: true });

      expect(result.vectorizerReused).toBe(false);
      const v1 = await deps.registry.loadVectorizer(1);
      const v2 = await deps.registry.loadVectorizer(2);
      expect(v2?.toJSON()).not.toEqual(v1?.toJSON());
    });

    it("rejects an invalid weight before touching the registry", async () => {
      const { deps, pipeline } = createTestPipeline(dir);

      await expect(pipeline.retrain({ feedbackWeight: -2 })).rejects.toThrow(
        "Feedback weight must be a non-negative integer, got -2"
      );
      expect(await deps.registry.listVersions()).toEqual([]);
    });

    it("never overwrites an existing next version", async () => {
      const { deps, pipeline } = createTestPipeline(dir);
      await pipeline.trainBaseline();
      const other = fitTestModel();
      await deps.registry.register(2, other.classifier, other.vectorizer, LABELS);
      await deps.registry.promote(1);

      await expect(pipeline.retrain()).rejects.toBeInstanceOf(VersionConflictError);
      expect(await deps.registry.resolveCurrentVersion()).toEqual({ success: true, data: 1 });
      expect((await deps.metrics.load(2)).success).toBe(false);
    });

    it("leaves the previous version current when metrics cannot be saved", async () => {
      const { deps } = createTestPipeline(dir);
      await new TrainingPipeline(deps).trainBaseline();

      const failing = new TrainingPipeline({ ...deps, metrics: new FailingMetricsStore(path.join(dir, "metrics")) });
      await expect(failing.retrain()).rejects.toThrow("disk full");

      expect(await deps.registry.resolveCurrentVersion()).toEqual({ success: true, data: 1 });
      expect(await deps.registry.listVersions()).toEqual([1]);

      const next = await new TrainingPipeline(deps).retrain();
      expect(next.versionId).toBe(2);
      expect(await deps.registry.resolveCurrentVersion()).toEqual({ success: true, data: 2 });
    });

    it("rolls back the new version and its metrics when promotion fails", async () => {
      const { deps } = createTestPipeline(dir);
      await new TrainingPipeline(deps).trainBaseline();

      const registry = new FailingPromoteRegistry(path.join(dir, "models"));
      await expect(new TrainingPipeline({ ...deps, registry }).retrain()).rejects.toThrow("pointer unwritable");

      expect(await deps.registry.listVersions()).toEqual([1]);
      expect((await deps.metrics.load(2)).success).toBe(false);
    });
  });

  describe("trainBaseline rollback", () => {
    it("leaves an empty registry when metrics cannot be saved", async () => {
      const { deps } = createTestPipeline(dir);
      const failing = new TrainingPipeline({ ...deps, metrics: new FailingMetricsStore(path.join(dir, "metrics")) });

      await expect(failing.trainBaseline()).rejects.toThrow("disk full");

      expect(await deps.registry.listVersions()).toEqual([]);
      expect((await deps.registry.resolveCurrentVersion()).success).toBe(false);
      expect((await new TrainingPipeline(deps).trainBaseline()).versionId).toBe(1);
    });
  });
});

describe("alignLabels", () => {
  it("returns the corpus unchanged when the schemas match", () => {
    const corpus = createTestCorpus();
    expect(alignLabels(corpus, LABELS)).toBe(corpus);
  });

  it("re-indexes labels by name", () => {
    const corpus = createTestCorpus({
      trainLabels: [0, 1],
      trainTexts: ["a", "b"],
      testLabels: [1],
      testTexts: ["c"],
      labelNames: ["Sports", "World"],
    });

    const aligned = alignLabels(corpus, ["World", "Sports"]);

    expect(aligned.trainLabels).toEqual([1, 0]);
    expect(aligned.testLabels).toEqual([0]);
    expect(aligned.labelNames).toEqual(["World", "Sports"]);
  });

  it("fails on a corpus label the schema lacks", () => {
    const corpus = createTestCorpus({ labelNames: ["World", "Sports", "Business", "Weather"] });

    expect(() => alignLabels(corpus, LABELS)).toThrow(UnknownLabelError);
  });
});
