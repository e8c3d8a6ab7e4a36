import { ValidationError } from "../lib/errors.js";

import { ARTIFACT_FORMAT_VERSION } from "./schema.js";

import type { SoftmaxArtifact } from "./schema.js";
import type { FeatureMatrix, SoftmaxOptions, SparseVector, TextClassifier } from "./types.js";

export const DEFAULT_SOFTMAX_OPTIONS: SoftmaxOptions = {
  c: 1.0,
  maxIter: 200,
  learningRate: 0.5,
};

/**
 * Multinomial logistic regression fit by full-batch gradient descent.
 *
 * Minimizes mean cross-entropy plus ||W||² / (2·c·n). Weights start at zero,
 * so a fit is deterministic for a given input order.
 */
export class SoftmaxRegression implements TextClassifier {
  private readonly options: SoftmaxOptions;
  private weights: number[][] = [];
  private intercepts: number[] = [];
  private featureCount = 0;

  constructor(options: Partial<SoftmaxOptions> = {}) {
    this.options = { ...DEFAULT_SOFTMAX_OPTIONS, ...options };
  }

  get classCount(): number {
    return this.intercepts.length;
  }

  /**
   * Restore a fitted classifier from its artifact
   */
  static fromJSON(artifact: SoftmaxArtifact): SoftmaxRegression {
    const classifier = new SoftmaxRegression({
      c: artifact.c,
      maxIter: artifact.maxIter,
      learningRate: artifact.learningRate,
    });
    classifier.weights = artifact.weights.map((row) => [...row]);
    classifier.intercepts = [...artifact.intercepts];
    classifier.featureCount = artifact.featureCount;
    return classifier;
  }

  fit(features: FeatureMatrix, labels: readonly number[], classCount: number): void {
    const n = features.rows.length;
    if (n === 0) {
      throw new ValidationError("Cannot fit a classifier on an empty training set");
    }
    if (labels.length !== n) {
      throw new ValidationError(`Got ${n} feature rows but ${labels.length} labels`);
    }
    const outOfRange = labels.find((label) => !Number.isInteger(label) || label < 0 || label >= classCount);
    if (outOfRange !== undefined) {
      throw new ValidationError(`Label ${outOfRange} is outside [0, ${classCount})`);
    }

    const d = features.columns;
    const { c, maxIter, learningRate } = this.options;
    const weights = Array.from({ length: classCount }, () => new Array<number>(d).fill(0));
    const intercepts = new Array<number>(classCount).fill(0);

    for (let iter = 0; iter < maxIter; iter++) {
      const weightGrad = Array.from({ length: classCount }, () => new Array<number>(d).fill(0));
      const interceptGrad = new Array<number>(classCount).fill(0);

      features.rows.forEach((row, i) => {
        const probabilities = softmax(scores(row, weights, intercepts));
        for (let k = 0; k < classCount; k++) {
          const residual = (probabilities[k] ?? 0) - (labels[i] === k ? 1 : 0);
          interceptGrad[k] = (interceptGrad[k] ?? 0) + residual;
          const gradRow = weightGrad[k];
          if (gradRow === undefined) continue;
          row.indices.forEach((column, j) => {
            gradRow[column] = (gradRow[column] ?? 0) + residual * (row.values[j] ?? 0);
          });
        }
      });

      for (let k = 0; k < classCount; k++) {
        const weightRow = weights[k];
        const gradRow = weightGrad[k];
        if (weightRow === undefined || gradRow === undefined) continue;
        for (let j = 0; j < d; j++) {
          const w = weightRow[j] ?? 0;
          const grad = (gradRow[j] ?? 0) / n + w / (c * n);
          weightRow[j] = w - learningRate * grad;
        }
        intercepts[k] = (intercepts[k] ?? 0) - learningRate * ((interceptGrad[k] ?? 0) / n);
      }
    }

    this.weights = weights;
    this.intercepts = intercepts;
    this.featureCount = d;
  }

  predictProba(features: FeatureMatrix): number[][] {
    this.assertFitted(features);
    return features.rows.map((row) => softmax(scores(row, this.weights, this.intercepts)));
  }

  predict(features: FeatureMatrix): number[] {
    return this.predictProba(features).map(argmax);
  }

  toJSON(): SoftmaxArtifact {
    return {
      kind: "softmax-regression",
      formatVersion: ARTIFACT_FORMAT_VERSION,
      classCount: this.classCount,
      featureCount: this.featureCount,
      c: this.options.c,
      maxIter: this.options.maxIter,
      learningRate: this.options.learningRate,
      weights: this.weights.map((row) => [...row]),
      intercepts: [...this.intercepts],
    };
  }

  private assertFitted(features: FeatureMatrix): void {
    if (this.classCount === 0) {
      throw new ValidationError("Classifier has not been fitted");
    }
    if (features.columns !== this.featureCount) {
      throw new ValidationError(
        `Feature space mismatch: classifier expects ${this.featureCount} columns, got ${features.columns}`
      );
    }
  }
}

function scores(row: SparseVector, weights: number[][], intercepts: number[]): number[] {
  return intercepts.map((intercept, k) => {
    const weightRow = weights[k] ?? [];
    let z = intercept;
    row.indices.forEach((column, j) => {
      z += (weightRow[column] ?? 0) * (row.values[j] ?? 0);
    });
    return z;
  });
}

function softmax(values: number[]): number[] {
  const max = Math.max(...values);
  const exps = values.map((value) => Math.exp(value - max));
  const total = exps.reduce((sum, value) => sum + value, 0);
  return exps.map((value) => value / total);
}

/**
 * Index of the largest value; the first one wins a tie
 */
export function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if ((values[i] ?? -Infinity) > (values[best] ?? -Infinity)) {
      best = i;
    }
  }
  return best;
}
