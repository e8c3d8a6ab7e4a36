import chalk from "chalk";

import type { FeedbackRecord } from "../feedback/index.js";
import type { MetricsRecord, MetricsSummary } from "../metrics/index.js";
import type { Prediction } from "../serving/index.js";
import type { TrainingResult } from "../training/index.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

/**
 * Check if a string is a valid output format
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return format === "terminal" || format === "json";
}

function percent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

function signed(value: number): string {
  const text = `${value >= 0 ? "+" : ""}${(value * 100).toFixed(2)}`;
  if (value > 0) return chalk.green(text);
  if (value < 0) return chalk.red(text);
  return chalk.gray(text);
}

/**
 * Per-class report and confusion matrix for one version
 */
export function formatMetricsTerminal(versionId: number, metrics: MetricsRecord): string {
  const lines: string[] = [];
  lines.push(chalk.bold.underline(`Metrics for model v${versionId}`));
  lines.push("");
  lines.push(`  Accuracy:      ${chalk.bold(percent(metrics.accuracy))}`);
  lines.push(`  F1 (macro):    ${chalk.bold(percent(metrics.f1Macro))}`);
  lines.push(`  F1 (weighted): ${chalk.bold(percent(metrics.f1Weighted))}`);
  lines.push("");

  const width = Math.max(8, ...metrics.labelNames.map((name) => name.length));
  lines.push(
    chalk.gray(`  ${"label".padEnd(width)}  precision  recall     f1         support`)
  );
  lines.push(chalk.gray("  " + "─".repeat(width + 40)));
  for (const label of metrics.labelNames) {
    const m = metrics.perClass[label];
    if (m === undefined) continue;
    lines.push(
      `  ${label.padEnd(width)}  ${m.precision.toFixed(4).padEnd(9)}  ${m.recall.toFixed(4).padEnd(9)}  ${m.f1.toFixed(4).padEnd(9)}  ${m.support}`
    );
  }
  lines.push("");

  lines.push(chalk.bold("Confusion matrix") + chalk.gray(" (rows: true, columns: predicted)"));
  const cell = Math.max(6, ...metrics.confusionMatrix.flat().map((count) => String(count).length + 1));
  lines.push(chalk.gray(`  ${"".padEnd(width)}${metrics.labelNames.map((_, i) => String(i).padStart(cell)).join("")}`));
  metrics.confusionMatrix.forEach((row, i) => {
    const name = `${i} ${metrics.labelNames[i] ?? ""}`;
    lines.push(`  ${name.padEnd(width)}${row.map((count) => String(count).padStart(cell)).join("")}`);
  });

  return lines.join("\n");
}

/**
 * Metrics for one version in the requested format
 */
export function formatMetrics(versionId: number, metrics: MetricsRecord, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify({ version: `v${versionId}`, metrics }, null, 2);
  }
  return formatMetricsTerminal(versionId, metrics);
}

/**
 * Comparison table with deltas against the first version listed
 */
export function formatComparison(comparison: Map<number, MetricsSummary>, format: OutputFormat): string {
  if (format === "json") {
    const entries = [...comparison.entries()].map(([versionId, summary]) => [`v${versionId}`, summary]);
    return JSON.stringify(Object.fromEntries(entries), null, 2);
  }

  if (comparison.size === 0) {
    return chalk.yellow("No metrics found for the requested versions.");
  }

  const first = comparison.values().next().value;
  const lines: string[] = [];
  lines.push(chalk.bold.underline("Model comparison"));
  lines.push("");
  lines.push(chalk.gray("  version  accuracy   f1_macro   f1_weighted  Δacc     Δf1_macro"));
  for (const [versionId, summary] of comparison) {
    const deltaAcc = first === undefined ? 0 : summary.accuracy - first.accuracy;
    const deltaF1 = first === undefined ? 0 : summary.f1Macro - first.f1Macro;
    lines.push(
      `  ${`v${versionId}`.padEnd(7)}  ${summary.accuracy.toFixed(4).padEnd(9)}  ${summary.f1Macro.toFixed(4).padEnd(9)}  ${summary.f1Weighted.toFixed(4).padEnd(11)}  ${signed(deltaAcc)}  ${signed(deltaF1)}`
    );
  }
  return lines.join("\n");
}

/**
 * One prediction
 */
export function formatPrediction(prediction: Prediction): string {
  return `${chalk.bold(prediction.label)} ${chalk.gray(`(${percent(prediction.confidence)} confidence, model v${prediction.versionId})`)}`;
}

/**
 * Summary of a training run
 */
export function formatTrainingResult(result: TrainingResult): string {
  const lines: string[] = [];
  lines.push(chalk.green.bold(`Model v${result.versionId} trained and promoted`));
  if (result.baselineVersion !== null) {
    lines.push(chalk.gray(`  Retrained from v${result.baselineVersion}${result.vectorizerReused ? " (vocabulary reused)" : " (vocabulary refit)"}`));
  }
  lines.push(`  Original samples:  ${result.originalSamples}`);
  lines.push(`  Feedback samples:  ${result.feedbackSamples}`);
  lines.push(`  Weighted feedback: ${result.weightedFeedbackSamples}`);
  lines.push(`  Total samples:     ${result.totalSamples}`);
  lines.push(`  Test accuracy:     ${percent(result.metrics.accuracy)}`);
  lines.push(`  Test F1 (macro):   ${percent(result.metrics.f1Macro)}`);
  if (result.improvement !== undefined) {
    lines.push(`  Δ accuracy vs v${result.baselineVersion}: ${signed(result.improvement.accuracy)}`);
    lines.push(`  Δ F1 (macro) vs v${result.baselineVersion}: ${signed(result.improvement.f1Macro)}`);
  }
  return lines.join("\n");
}

/**
 * Feedback records, most recent last
 */
export function formatFeedbackList(records: readonly FeedbackRecord[]): string {
  if (records.length === 0) {
    return chalk.yellow("No feedback recorded yet.");
  }
  return records
    .map((record) => {
      const text = record.text.length > 60 ? record.text.slice(0, 57) + "..." : record.text;
      const version = record.sourceModelVersion === null ? "-" : `v${record.sourceModelVersion}`;
      const changed = record.modelPrediction !== record.humanLabel;
      const labels = changed
        ? `${chalk.red(record.modelPrediction || "?")} → ${chalk.green(record.humanLabel)}`
        : chalk.green(record.humanLabel);
      return `${chalk.gray(record.timestamp)} ${chalk.gray(version)} ${labels}  ${text}`;
    })
    .join("\n");
}

/**
 * Format error for display
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format warning for display
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format success message for display
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
