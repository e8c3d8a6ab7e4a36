import type { TextClassifier, TextVectorizer } from "../classifier/index.js";
import type { CorpusSource } from "../corpus/index.js";
import type { FeedbackStore } from "../feedback/index.js";
import type { MetricsRecord, MetricsStore } from "../metrics/index.js";
import type { ModelRegistry } from "../registry/index.js";

/**
 * Collaborators of a training run
 */
export interface TrainingDependencies {
  registry: ModelRegistry;
  metrics: MetricsStore;
  feedback: FeedbackStore;
  corpus: CorpusSource;
  /** Builds an unfitted vectorizer when one has to be fit */
  createVectorizer: () => TextVectorizer;
  /** Builds an unfitted classifier for every run */
  createClassifier: () => TextClassifier;
}

/**
 * Retraining options
 */
export interface RetrainOptions {
  /** Times each feedback row is repeated (non-negative integer, default 1) */
  feedbackWeight?: number;
  /** Fit a new vectorizer instead of reusing the baseline vocabulary */
  refitVectorizer?: boolean;
}

/**
 * Change in headline metrics relative to the version retrained from
 */
export interface MetricsDelta {
  accuracy: number;
  f1Macro: number;
}

/**
 * Outcome of a training run
 */
export interface TrainingResult {
  versionId: number;
  /** Version the run started from; null for a baseline */
  baselineVersion: number | null;
  originalSamples: number;
  feedbackSamples: number;
  /** Feedback rows after weighting */
  weightedFeedbackSamples: number;
  totalSamples: number;
  vectorizerReused: boolean;
  metrics: MetricsRecord;
  /** Present when the baseline version has stored metrics */
  improvement?: MetricsDelta;
}
