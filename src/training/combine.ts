import { UnknownLabelError, ValidationError } from "../lib/errors.js";

import type { TrainingSample } from "../feedback/index.js";

/**
 * Parallel texts and label ids
 */
export interface LabeledSet {
  texts: string[];
  labels: number[];
}

/**
 * Feedback mapped onto label ids
 */
export interface LabeledSample {
  text: string;
  label: number;
}

/**
 * Index of a label name in the schema. Surrounding whitespace is ignored;
 * the match is otherwise exact.
 */
export function labelIdFor(label: string, labelSchema: readonly string[]): number {
  const id = labelSchema.indexOf(label.trim());
  if (id === -1) {
    throw new UnknownLabelError(label, labelSchema);
  }
  return id;
}

/**
 * Map feedback labels to ids, failing on the first label the schema lacks
 */
export function toLabeledSamples(
  samples: readonly TrainingSample[],
  labelSchema: readonly string[]
): LabeledSample[] {
  return samples.map((sample) => ({
    text: sample.text,
    label: labelIdFor(sample.humanLabel, labelSchema),
  }));
}

/**
 * Original rows followed by each feedback row repeated `feedbackWeight` times
 */
export function combineDatasets(
  original: LabeledSet,
  feedback: readonly LabeledSample[],
  feedbackWeight = 1
): LabeledSet {
  if (!Number.isInteger(feedbackWeight) || feedbackWeight < 0) {
    throw new ValidationError(`Feedback weight must be a non-negative integer, got ${feedbackWeight}`);
  }
  if (original.texts.length !== original.labels.length) {
    throw new ValidationError(
      `Got ${original.texts.length} training texts but ${original.labels.length} labels`
    );
  }

  const texts = [...original.texts];
  const labels = [...original.labels];

  for (const sample of feedback) {
    for (let i = 0; i < feedbackWeight; i++) {
      texts.push(sample.text);
      labels.push(sample.label);
    }
  }

  return { texts, labels };
}
