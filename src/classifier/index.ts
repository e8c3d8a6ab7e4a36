/**
 * Text classification capability: vectorizer, classifier and their artifacts.
 */

import { ArtifactError } from "../lib/errors.js";

import { SoftmaxArtifactSchema, TfidfArtifactSchema } from "./schema.js";
import { SoftmaxRegression } from "./softmax-regression.js";
import { TfidfVectorizer } from "./tfidf.js";

import type { TextClassifier, TextVectorizer } from "./types.js";

export type {
  SparseVector,
  FeatureMatrix,
  TextVectorizer,
  TextClassifier,
  TfidfOptions,
  SoftmaxOptions,
} from "./types.js";
export type { TfidfArtifact, SoftmaxArtifact } from "./schema.js";
export {
  TfidfArtifactSchema,
  SoftmaxArtifactSchema,
  ARTIFACT_FORMAT_VERSION,
} from "./schema.js";
export { TfidfVectorizer, DEFAULT_TFIDF_OPTIONS } from "./tfidf.js";
export { SoftmaxRegression, DEFAULT_SOFTMAX_OPTIONS, argmax } from "./softmax-regression.js";
export { tokenize, ngrams } from "./tokenizer.js";

/**
 * Rebuild a vectorizer from parsed JSON, failing on a malformed artifact
 */
export function restoreVectorizer(raw: unknown, versionId?: number): TextVectorizer {
  const parsed = TfidfArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ArtifactError("Invalid vectorizer artifact", {
      artifact: "vectorizer",
      versionId,
      issues: parsed.error.issues,
    });
  }
  return TfidfVectorizer.fromJSON(parsed.data);
}

/**
 * Rebuild a classifier from parsed JSON, failing on a malformed artifact
 */
export function restoreClassifier(raw: unknown, versionId?: number): TextClassifier {
  const parsed = SoftmaxArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ArtifactError("Invalid classifier artifact", {
      artifact: "classifier",
      versionId,
      issues: parsed.error.issues,
    });
  }
  return SoftmaxRegression.fromJSON(parsed.data);
}
