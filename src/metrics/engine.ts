import { ValidationError } from "../lib/errors.js";
import { findDuplicateLabel } from "../lib/labels.js";

import type { ClassMetrics, MetricsRecord } from "./types.js";

/**
 * Compute evaluation metrics for predicted against true label ids.
 *
 * Every label in the schema is reported, with zeros when it has no
 * support or was never predicted. Macro F1 averages over all schema labels.
 */
export function evaluate(
  trueLabels: readonly number[],
  predictedLabels: readonly number[],
  labelSchema: readonly string[]
): MetricsRecord {
  if (trueLabels.length !== predictedLabels.length) {
    throw new ValidationError(
      `Got ${trueLabels.length} true labels but ${predictedLabels.length} predictions`
    );
  }

  const duplicate = findDuplicateLabel(labelSchema);
  if (duplicate !== undefined) {
    throw new ValidationError(`Duplicate label "${duplicate}" in label schema`);
  }

  const size = labelSchema.length;
  const inSchema = (label: number): boolean => Number.isInteger(label) && label >= 0 && label < size;
  const invalid = [...trueLabels, ...predictedLabels].find((label) => !inSchema(label));
  if (invalid !== undefined) {
    throw new ValidationError(`Label id ${invalid} is outside the label schema`, { labelCount: size });
  }

  const confusionMatrix = Array.from({ length: size }, () => new Array<number>(size).fill(0));
  let correct = 0;
  trueLabels.forEach((actual, i) => {
    const predicted = predictedLabels[i] ?? 0;
    const row = confusionMatrix[actual];
    if (row !== undefined) {
      row[predicted] = (row[predicted] ?? 0) + 1;
    }
    if (actual === predicted) correct++;
  });

  const entries = labelSchema.map((label, k): [string, ClassMetrics] => {
    const truePositives = confusionMatrix[k]?.[k] ?? 0;
    const support = sum(confusionMatrix[k] ?? []);
    const predictedCount = sum(confusionMatrix.map((row) => row[k] ?? 0));

    const precision = safeDivide(truePositives, predictedCount);
    const recall = safeDivide(truePositives, support);
    const f1 = safeDivide(2 * precision * recall, precision + recall);

    return [label, { precision, recall, f1, support }];
  });
  const classScores = entries.map(([, metrics]) => metrics);
  // fromEntries defines own keys, so a label like "__proto__" is kept
  const perClass: Record<string, ClassMetrics> = Object.fromEntries(entries);

  const total = trueLabels.length;
  return {
    accuracy: safeDivide(correct, total),
    f1Macro: safeDivide(sum(classScores.map((m) => m.f1)), size),
    f1Weighted: safeDivide(sum(classScores.map((m) => m.f1 * m.support)), total),
    perClass,
    confusionMatrix,
    labelNames: [...labelSchema],
  };
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function safeDivide(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}
