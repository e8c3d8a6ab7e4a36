/**
 * Training pipeline: baseline training and feedback-driven retraining.
 *
 * Both runs are strictly sequential and commit only at the end, so a
 * failure at any stage leaves the registry exactly as it was.
 */

import { NoBaselineModelError, ValidationError, VersionConflictError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { unwrap } from "../lib/result.js";
import { evaluate } from "../metrics/index.js";

import { combineDatasets, labelIdFor, toLabeledSamples } from "./combine.js";

import type { TextClassifier, TextVectorizer } from "../classifier/index.js";
import type { Corpus } from "../corpus/index.js";
import type { NotFoundError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { MetricsRecord } from "../metrics/index.js";
import type { LabeledSet } from "./combine.js";
import type { MetricsDelta, RetrainOptions, TrainingDependencies, TrainingResult } from "./types.js";

const log = logger.child("[training]");

/**
 * Fitted artifacts and their evaluation
 */
interface FitOutcome {
  classifier: TextClassifier;
  vectorizer: TextVectorizer;
  metrics: MetricsRecord;
}

export class TrainingPipeline {
  constructor(private readonly deps: TrainingDependencies) {}

  /**
   * Train, register and promote version 1. Requires an empty registry.
   */
  async trainBaseline(): Promise<TrainingResult> {
    const { registry, corpus } = this.deps;

    const existing = await registry.listVersions();
    if (existing.length > 0) {
      throw new VersionConflictError(1);
    }

    log.info("Loading corpus...");
    const data = await corpus.load();
    log.info(`Training samples: ${data.trainTexts.length}, test samples: ${data.testTexts.length}`);

    const training: LabeledSet = { texts: data.trainTexts, labels: data.trainLabels };
    const outcome = this.fitAndEvaluate(training, data, data.labelNames, undefined);

    await this.commit(1, outcome, data.labelNames);

    return {
      versionId: 1,
      baselineVersion: null,
      originalSamples: data.trainTexts.length,
      feedbackSamples: 0,
      weightedFeedbackSamples: 0,
      totalSamples: data.trainTexts.length,
      vectorizerReused: false,
      metrics: outcome.metrics,
    };
  }

  /**
   * Retrain on the original corpus plus weighted feedback and promote the result
   */
  async retrain(options: RetrainOptions = {}): Promise<TrainingResult> {
    const { registry, corpus, feedback } = this.deps;
    const feedbackWeight = options.feedbackWeight ?? 1;
    if (!Number.isInteger(feedbackWeight) || feedbackWeight < 0) {
      throw new ValidationError(`Feedback weight must be a non-negative integer, got ${feedbackWeight}`);
    }

    // 1. Resolve baseline
    const current = await registry.resolveCurrentVersion();
    if (!current.success) {
      throw new NoBaselineModelError();
    }
    const baselineVersion = current.data;
    const nextVersion = baselineVersion + 1;
    log.info(`Current model version: v${baselineVersion}`);
    log.info(`Training new model version: v${nextVersion}`);

    // 2. Load corpus and the baseline's label schema
    const labelSchema = await registry.labelSchemaFor(baselineVersion);
    const data = alignLabels(await corpus.load(), labelSchema);

    // 3. Load feedback
    const samples = toLabeledSamples(await feedback.projectForTraining(), labelSchema);
    log.info(`Loaded ${samples.length} feedback samples`);
    if (samples.length === 0) {
      log.warn("No feedback samples found. Model will be retrained on original data only.");
    }

    // 4. Combine
    const combined = combineDatasets(
      { texts: data.trainTexts, labels: data.trainLabels },
      samples,
      feedbackWeight
    );
    const weightedFeedbackSamples = samples.length * feedbackWeight;
    log.info(
      `Combined dataset: ${data.trainTexts.length} original + ${weightedFeedbackSamples} weighted feedback = ${combined.texts.length}`
    );

    // 5. Reuse the baseline vocabulary unless asked to refit
    const reusable = options.refitVectorizer === true ? undefined : await registry.loadVectorizer(baselineVersion);
    if (reusable !== undefined) {
      log.info(`Reusing vectorizer from v${baselineVersion}`);
    }

    // 6-7. Fit and evaluate on the held-out split
    const outcome = this.fitAndEvaluate(combined, data, labelSchema, reusable);

    // 8. Commit
    if (await registry.has(nextVersion)) {
      throw new VersionConflictError(nextVersion);
    }
    await this.commit(nextVersion, outcome, labelSchema);

    const improvement = await this.improvementOver(baselineVersion, outcome.metrics);
    if (improvement !== undefined) {
      log.info(
        `Improvement over v${baselineVersion}: accuracy ${formatDelta(improvement.accuracy)}, F1 (macro) ${formatDelta(improvement.f1Macro)}`
      );
    }

    return {
      versionId: nextVersion,
      baselineVersion,
      originalSamples: data.trainTexts.length,
      feedbackSamples: samples.length,
      weightedFeedbackSamples,
      totalSamples: combined.texts.length,
      vectorizerReused: reusable !== undefined,
      metrics: outcome.metrics,
      ...(improvement !== undefined ? { improvement } : {}),
    };
  }

  private fitAndEvaluate(
    training: LabeledSet,
    data: Corpus,
    labelSchema: readonly string[],
    reusable: TextVectorizer | undefined
  ): FitOutcome {
    const vectorizer = reusable ?? this.deps.createVectorizer();
    log.info(reusable !== undefined ? "Transforming training texts..." : "Fitting vectorizer...");
    const trainFeatures = reusable !== undefined
      ? vectorizer.transform(training.texts)
      : vectorizer.fitTransform(training.texts);
    log.debug(`Feature matrix: ${trainFeatures.rows.length} x ${trainFeatures.columns}`);

    log.info("Fitting classifier...");
    const classifier = this.deps.createClassifier();
    classifier.fit(trainFeatures, training.labels, labelSchema.length);

    log.info("Evaluating on test set...");
    const predictions = classifier.predict(vectorizer.transform(data.testTexts));
    const metrics = evaluate(data.testLabels, predictions, labelSchema);
    log.info(`Test accuracy: ${metrics.accuracy.toFixed(4)}, F1 (macro): ${metrics.f1Macro.toFixed(4)}`);

    return { classifier, vectorizer, metrics };
  }

  /**
   * Register, persist metrics, then promote. A failure after registration
   * rolls the new version back, so the registry is left as it was.
   */
  private async commit(versionId: number, outcome: FitOutcome, labelSchema: readonly string[]): Promise<void> {
    const { registry, metrics } = this.deps;
    unwrap(await registry.register(versionId, outcome.classifier, outcome.vectorizer, labelSchema));
    try {
      await metrics.persist(outcome.metrics, versionId);
      unwrap(await registry.promote(versionId));
    } catch (error) {
      await this.rollback(versionId);
      throw error;
    }
    log.success(`Model v${versionId} is now current`);
  }

  private async rollback(versionId: number): Promise<void> {
    const { registry, metrics } = this.deps;
    try {
      await metrics.remove(versionId);
      unwrap(await registry.discard(versionId));
    } catch (error) {
      // The commit error is what the caller sees; this only reports the leftover
      log.error(
        `Could not roll back model v${versionId}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private async improvementOver(versionId: number, metrics: MetricsRecord): Promise<MetricsDelta | undefined> {
    let previous: Result<MetricsRecord, NotFoundError>;
    try {
      previous = await this.deps.metrics.load(versionId);
    } catch (error) {
      // The new version is already committed; a bad old record only loses the comparison
      log.warn(`Could not compare with v${versionId}: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
    if (!previous.success) {
      return undefined;
    }
    return {
      accuracy: metrics.accuracy - previous.data.accuracy,
      f1Macro: metrics.f1Macro - previous.data.f1Macro,
    };
  }
}

/**
 * Re-index corpus labels onto a model's label schema by name.
 * A corpus label the schema lacks is an UnknownLabelError.
 */
export function alignLabels(data: Corpus, labelSchema: readonly string[]): Corpus {
  const same =
    data.labelNames.length === labelSchema.length &&
    data.labelNames.every((name, i) => name === labelSchema[i]);
  if (same) {
    return data;
  }

  log.warn(`Corpus labels [${data.labelNames.join(", ")}] differ from the model schema; re-indexing by name`);
  const mapping = data.labelNames.map((name) => labelIdFor(name, labelSchema));
  const remap = (label: number): number => mapping[label] ?? labelIdFor(`Label_${label}`, labelSchema);
  return {
    trainTexts: data.trainTexts,
    trainLabels: data.trainLabels.map(remap),
    testTexts: data.testTexts,
    testLabels: data.testLabels.map(remap),
    labelNames: [...labelSchema],
  };
}

function formatDelta(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(4)}`;
}

/**
 * Create a training pipeline
 */
export function createTrainingPipeline(deps: TrainingDependencies): TrainingPipeline {
  return new TrainingPipeline(deps);
}
