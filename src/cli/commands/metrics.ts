/**
 * Metrics commands - show and compare evaluation metrics
 */

import { unwrap } from "../../lib/index.js";
import { formatComparison, formatError, formatMetrics, isValidOutputFormat } from "../formatters.js";
import { buildRuntime, exitWithError, globalOptions, parsePositiveInt } from "../shared.js";

import type { Command } from "commander";

export function registerMetricsCommands(program: Command): void {
  program
    .command("metrics")
    .description("Show evaluation metrics for a model version")
    .option("--version-id <n>", "Model version (default: current)")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .action(async (options: Record<string, unknown>, command: Command) => {
      const format = String(options["output"] ?? "terminal");
      if (!isValidOutputFormat(format)) {
        console.error(formatError(new Error(`Invalid output format: ${format}. Use: terminal, json`)));
        process.exit(1);
      }

      try {
        const runtime = buildRuntime(globalOptions(command));
        const versionId = typeof options["versionId"] === "string"
          ? parsePositiveInt(options["versionId"], "--version-id")
          : undefined;
        const result = unwrap(await runtime.service.getMetrics(versionId));
        console.log(formatMetrics(result.versionId, result.metrics, format));
      } catch (error) {
        exitWithError(error);
      }
    });

  program
    .command("compare [versions...]")
    .description("Compare metrics across versions (default: all registered)")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .action(async (versions: string[], options: Record<string, unknown>, command: Command) => {
      const format = String(options["output"] ?? "terminal");
      if (!isValidOutputFormat(format)) {
        console.error(formatError(new Error(`Invalid output format: ${format}. Use: terminal, json`)));
        process.exit(1);
      }

      try {
        const runtime = buildRuntime(globalOptions(command));
        const versionIds = versions.length > 0
          ? versions.map((v) => parsePositiveInt(v.replace(/^v/, ""), "version"))
          : await runtime.registry.listVersions();
        console.log(formatComparison(await runtime.metrics.compare(versionIds), format));
      } catch (error) {
        exitWithError(error);
      }
    });
}
