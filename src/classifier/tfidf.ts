import { ValidationError } from "../lib/errors.js";

import { ARTIFACT_FORMAT_VERSION } from "./schema.js";
import { ngrams, tokenize } from "./tokenizer.js";

import type { TfidfArtifact } from "./schema.js";
import type { FeatureMatrix, SparseVector, TextVectorizer, TfidfOptions } from "./types.js";

export const DEFAULT_TFIDF_OPTIONS: TfidfOptions = {
  maxFeatures: 10000,
  ngramRange: [1, 2],
  minDf: 2,
  maxDf: 0.95,
};

/**
 * TF-IDF vectorizer with smoothed idf and L2-normalized rows.
 *
 * Vocabulary selection drops terms outside [minDf, maxDf], keeps the
 * `maxFeatures` most frequent of the rest (ties broken alphabetically),
 * and numbers columns in alphabetical order of term.
 */
export class TfidfVectorizer implements TextVectorizer {
  private readonly options: TfidfOptions;
  private vocabulary: Map<string, number> = new Map();
  private idf: number[] = [];

  constructor(options: Partial<TfidfOptions> = {}) {
    this.options = { ...DEFAULT_TFIDF_OPTIONS, ...options };
    const [min, max] = this.options.ngramRange;
    if (min < 1 || max < min) {
      throw new ValidationError(`Invalid ngram range [${min}, ${max}]`);
    }
  }

  get featureCount(): number {
    return this.idf.length;
  }

  /**
   * Restore a fitted vectorizer from its artifact
   */
  static fromJSON(artifact: TfidfArtifact): TfidfVectorizer {
    const vectorizer = new TfidfVectorizer({
      maxFeatures: artifact.maxFeatures,
      ngramRange: artifact.ngramRange,
      minDf: artifact.minDf,
      maxDf: artifact.maxDf,
    });
    vectorizer.vocabulary = new Map(Object.entries(artifact.vocabulary));
    vectorizer.idf = [...artifact.idf];
    return vectorizer;
  }

  fitTransform(texts: readonly string[]): FeatureMatrix {
    const documents = texts.map((text) => ngrams(tokenize(text), this.options.ngramRange));
    const documentFrequency = new Map<string, number>();
    const termFrequency = new Map<string, number>();

    for (const terms of documents) {
      for (const term of terms) {
        termFrequency.set(term, (termFrequency.get(term) ?? 0) + 1);
      }
      for (const term of new Set(terms)) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const documentCount = documents.length;
    const maxDocumentCount = this.options.maxDf * documentCount;

    const selected = [...documentFrequency.entries()]
      .filter(([, df]) => df >= this.options.minDf && df <= maxDocumentCount)
      .map(([term]) => term)
      .sort((a, b) => {
        const diff = (termFrequency.get(b) ?? 0) - (termFrequency.get(a) ?? 0);
        return diff !== 0 ? diff : compareTerms(a, b);
      })
      .slice(0, this.options.maxFeatures)
      .sort(compareTerms);

    this.vocabulary = new Map(selected.map((term, index) => [term, index]));
    this.idf = selected.map((term) => {
      const df = documentFrequency.get(term) ?? 0;
      return Math.log((1 + documentCount) / (1 + df)) + 1;
    });

    return {
      rows: documents.map((terms) => this.vectorize(terms)),
      columns: this.featureCount,
    };
  }

  transform(texts: readonly string[]): FeatureMatrix {
    return {
      rows: texts.map((text) => this.vectorize(ngrams(tokenize(text), this.options.ngramRange))),
      columns: this.featureCount,
    };
  }

  toJSON(): TfidfArtifact {
    return {
      kind: "tfidf",
      formatVersion: ARTIFACT_FORMAT_VERSION,
      maxFeatures: this.options.maxFeatures,
      ngramRange: [...this.options.ngramRange],
      minDf: this.options.minDf,
      maxDf: this.options.maxDf,
      vocabulary: Object.fromEntries(this.vocabulary),
      idf: [...this.idf],
    };
  }

  private vectorize(terms: readonly string[]): SparseVector {
    const counts = new Map<number, number>();
    for (const term of terms) {
      const index = this.vocabulary.get(term);
      if (index !== undefined) {
        counts.set(index, (counts.get(index) ?? 0) + 1);
      }
    }

    const indices = [...counts.keys()].sort((a, b) => a - b);
    const values = indices.map((index) => (counts.get(index) ?? 0) * (this.idf[index] ?? 0));

    const norm = Math.sqrt(values.reduce((sum, value) => sum + value * value, 0));
    return {
      indices,
      values: norm > 0 ? values.map((value) => value / norm) : values,
    };
  }
}

function compareTerms(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
