import type { TfidfArtifact, SoftmaxArtifact } from "./schema.js";

/**
 * Sparse feature row: parallel arrays of column indices (ascending) and values
 */
export interface SparseVector {
  indices: number[];
  values: number[];
}

/**
 * Rows produced by a vectorizer, all sharing one feature space
 */
export interface FeatureMatrix {
  rows: SparseVector[];
  columns: number;
}

/**
 * Text-to-feature transform
 */
export interface TextVectorizer {
  /** Number of columns in the fitted feature space */
  readonly featureCount: number;
  /** Learn the vocabulary from texts and transform them */
  fitTransform(texts: readonly string[]): FeatureMatrix;
  /** Transform texts using the fitted vocabulary */
  transform(texts: readonly string[]): FeatureMatrix;
  toJSON(): TfidfArtifact;
}

/**
 * Trainable multi-class classifier over feature rows
 */
export interface TextClassifier {
  readonly classCount: number;
  /**
   * Fit on rows and integer label ids. `classCount` fixes the output space,
   * so labels with no training rows still get a (never predicted) class.
   */
  fit(features: FeatureMatrix, labels: readonly number[], classCount: number): void;
  predict(features: FeatureMatrix): number[];
  /** Per-row class probabilities; each row sums to 1 */
  predictProba(features: FeatureMatrix): number[][];
  toJSON(): SoftmaxArtifact;
}

/**
 * TF-IDF settings
 */
export interface TfidfOptions {
  /** Maximum vocabulary size, keeping the most frequent terms */
  maxFeatures: number;
  /** Smallest and largest n-gram length */
  ngramRange: [number, number];
  /** Minimum document count for a term */
  minDf: number;
  /** Maximum document frequency as a fraction of the corpus */
  maxDf: number;
}

/**
 * Softmax regression settings
 */
export interface SoftmaxOptions {
  /** Inverse L2 regularization strength */
  c: number;
  /** Gradient descent iterations */
  maxIter: number;
  learningRate: number;
}
