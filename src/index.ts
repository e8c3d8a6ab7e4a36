/**
 * relabel - human-in-the-loop text classification
 *
 * @packageDocumentation
 */

// Model registry
export { ModelRegistry, createModelRegistry, DEFAULT_LABEL_SCHEMA } from "./registry/index.js";
export type { LoadedModel } from "./registry/index.js";

// Feedback
export {
  FeedbackStore,
  createFeedbackStore,
  projectForTraining,
  summarize,
  generateReport,
  FeedbackInputSchema,
  FeedbackRecordSchema,
} from "./feedback/index.js";
export type { FeedbackInput, FeedbackRecord, FeedbackSummary, TrainingSample } from "./feedback/index.js";

// Metrics
export { evaluate, MetricsStore, createMetricsStore, MetricsRecordSchema } from "./metrics/index.js";
export type { MetricsRecord, ClassMetrics, MetricsSummary } from "./metrics/index.js";

// Training
export {
  TrainingPipeline,
  createTrainingPipeline,
  combineDatasets,
  labelIdFor,
  toLabeledSamples,
  alignLabels,
} from "./training/index.js";
export type {
  TrainingDependencies,
  RetrainOptions,
  TrainingResult,
  MetricsDelta,
  LabeledSet,
  LabeledSample,
} from "./training/index.js";

// Corpus
export { JsonCorpusSource, InMemoryCorpusSource, CorpusFileSchema } from "./corpus/index.js";
export type { Corpus, CorpusSource, CorpusFile } from "./corpus/index.js";

// Classifier capability
export {
  TfidfVectorizer,
  SoftmaxRegression,
  restoreClassifier,
  restoreVectorizer,
} from "./classifier/index.js";
export type {
  TextVectorizer,
  TextClassifier,
  FeatureMatrix,
  SparseVector,
  TfidfOptions,
  SoftmaxOptions,
} from "./classifier/index.js";

// Serving
export {
  ModelHandle,
  createModelHandle,
  PredictionService,
  createPredictionService,
  createApp,
} from "./serving/index.js";
export type { Prediction, FeedbackSubmission, VersionMetrics, HealthStatus } from "./serving/index.js";

// Configuration and wiring
export { loadConfig, resolveLayout } from "./config/index.js";
export type { Config, ResolvedConfig, DataLayout } from "./config/index.js";
export { createRuntime } from "./runtime.js";
export type { Runtime } from "./runtime.js";

// Library utilities
export {
  // Errors
  RelabelError,
  ValidationError,
  EmptyInputError,
  ConfigError,
  NotFoundError,
  VersionConflictError,
  NoBaselineModelError,
  UnknownLabelError,
  NoModelAvailableError,
  ArtifactError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  // Logger
  logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";

export { VERSION } from "./version.js";
