import { argmax } from "../classifier/index.js";
import { EmptyInputError, NotFoundError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";

import type { FeedbackRecord, FeedbackStore } from "../feedback/index.js";
import type { NoModelAvailableError, ValidationError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { MetricsRecord, MetricsStore } from "../metrics/index.js";
import type { ModelRegistry } from "../registry/index.js";
import type { ModelHandle } from "./model-handle.js";

/**
 * A single prediction
 */
export interface Prediction {
  label: string;
  /** Probability of the predicted class */
  confidence: number;
  versionId: number;
}

/**
 * Feedback as submitted through the serving layer
 */
export interface FeedbackSubmission {
  text: string;
  modelPrediction?: string;
  humanLabel: string;
}

export interface VersionMetrics {
  versionId: number;
  metrics: MetricsRecord;
}

export interface HealthStatus {
  status: "healthy";
  modelLoaded: boolean;
  currentVersion: number | null;
}

export interface ServiceDependencies {
  handle: ModelHandle;
  registry: ModelRegistry;
  feedback: FeedbackStore;
  metrics: MetricsStore;
}

/**
 * Operations the serving layer exposes: predict, record feedback,
 * and read versions and metrics.
 */
export class PredictionService {
  constructor(private readonly deps: ServiceDependencies) {}

  /**
   * Classify a text with the current model.
   * Blank input fails before any model load; a missing model gets one reload attempt.
   */
  async predict(text: string): Promise<Result<Prediction, EmptyInputError | NoModelAvailableError | NotFoundError>> {
    if (text.trim() === "") {
      return err(new EmptyInputError());
    }

    const { handle } = this.deps;
    let model = await handle.get();
    if (!model.success && model.error instanceof NotFoundError) {
      handle.reload();
      model = await handle.get();
    }
    if (!model.success) {
      return model;
    }

    const { classifier, vectorizer, labelSchema, versionId } = model.data;
    const probabilities = classifier.predictProba(vectorizer.transform([text]))[0] ?? [];
    const id = argmax(probabilities);

    return ok({
      label: labelSchema[id] ?? `Label_${id}`,
      confidence: probabilities[id] ?? 0,
      versionId,
    });
  }

  /**
   * Record a human correction, stamped with the version currently live
   */
  async submitFeedback(submission: FeedbackSubmission): Promise<Result<FeedbackRecord, ValidationError>> {
    const sourceModelVersion = await this.liveVersion();
    return this.deps.feedback.append({
      text: submission.text,
      modelPrediction: submission.modelPrediction ?? "",
      humanLabel: submission.humanLabel,
      sourceModelVersion,
    });
  }

  /**
   * Metrics for a version, or for the current one when none is given
   */
  async getMetrics(versionId?: number): Promise<Result<VersionMetrics, NotFoundError>> {
    let target = versionId;
    if (target === undefined) {
      const current = await this.deps.registry.resolveCurrentVersion();
      if (!current.success) {
        return current;
      }
      target = current.data;
    }

    const metrics = await this.deps.metrics.load(target);
    return metrics.success ? ok({ versionId: target, metrics: metrics.data }) : metrics;
  }

  getCurrentVersion(): Promise<Result<number, NotFoundError>> {
    return this.deps.registry.resolveCurrentVersion();
  }

  health(): HealthStatus {
    const loaded = this.deps.handle.current;
    return {
      status: "healthy",
      modelLoaded: loaded !== undefined,
      currentVersion: loaded?.versionId ?? null,
    };
  }

  private async liveVersion(): Promise<number | null> {
    const loaded = this.deps.handle.current;
    if (loaded !== undefined) {
      return loaded.versionId;
    }
    const current = await this.deps.registry.resolveCurrentVersion();
    return current.success ? current.data : null;
  }
}

/**
 * Create a prediction service
 */
export function createPredictionService(deps: ServiceDependencies): PredictionService {
  return new PredictionService(deps);
}
