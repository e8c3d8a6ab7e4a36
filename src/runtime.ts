import { SoftmaxRegression, TfidfVectorizer } from "./classifier/index.js";
import { JsonCorpusSource } from "./corpus/index.js";
import { createFeedbackStore } from "./feedback/index.js";
import { createMetricsStore } from "./metrics/index.js";
import { createModelRegistry } from "./registry/index.js";
import { createModelHandle, createPredictionService } from "./serving/index.js";
import { createTrainingPipeline } from "./training/index.js";

import type { ResolvedConfig } from "./config/index.js";
import type { CorpusSource } from "./corpus/index.js";
import type { FeedbackStore } from "./feedback/index.js";
import type { MetricsStore } from "./metrics/index.js";
import type { ModelRegistry } from "./registry/index.js";
import type { ModelHandle, PredictionService } from "./serving/index.js";
import type { TrainingPipeline } from "./training/index.js";

/**
 * Every component, wired against one data directory
 */
export interface Runtime {
  config: ResolvedConfig;
  registry: ModelRegistry;
  feedback: FeedbackStore;
  metrics: MetricsStore;
  corpus: CorpusSource;
  pipeline: TrainingPipeline;
  handle: ModelHandle;
  service: PredictionService;
}

/**
 * Build the components for a configuration. The corpus source can be
 * replaced, e.g. with an in-memory corpus.
 */
export function createRuntime(config: ResolvedConfig, corpus?: CorpusSource): Runtime {
  const { paths } = config;
  const registry = createModelRegistry(paths.modelsDir);
  const feedback = createFeedbackStore(paths.feedbackPath);
  const metrics = createMetricsStore(paths.metricsDir);
  const source = corpus ?? new JsonCorpusSource(paths.corpusPath);

  const pipeline = createTrainingPipeline({
    registry,
    metrics,
    feedback,
    corpus: source,
    createVectorizer: () => new TfidfVectorizer(config.vectorizer),
    createClassifier: () => new SoftmaxRegression(config.classifier),
  });

  const handle = createModelHandle(registry);
  const service = createPredictionService({ handle, registry, feedback, metrics });

  return { config, registry, feedback, metrics, corpus: source, pipeline, handle, service };
}
