/**
 * Training commands - baseline training and feedback-driven retraining
 */

import ora from "ora";

import { unwrap } from "../../lib/index.js";
import { formatTrainingResult } from "../formatters.js";
import { buildRuntime, exitWithError, globalOptions } from "../shared.js";

import type { Command } from "commander";

export function registerTrainCommands(program: Command): void {
  program
    .command("train-baseline")
    .description("Train the first model version on the original corpus")
    .action(async (_options: Record<string, unknown>, command: Command) => {
      const global = globalOptions(command);
      const spinner = global.quiet === true ? null : ora("Training baseline model...").start();
      try {
        const runtime = buildRuntime(global);
        const result = await runtime.pipeline.trainBaseline();
        spinner?.stop();
        console.log(formatTrainingResult(result));
      } catch (error) {
        exitWithError(error, spinner);
      }
    });

  program
    .command("retrain")
    .description("Retrain on the original corpus plus collected feedback")
    .option("-w, --feedback-weight <n>", "Times each feedback sample is repeated")
    .option("--refit-vectorizer", "Fit a new vocabulary instead of reusing the current one")
    .action(async (options: Record<string, unknown>, command: Command) => {
      const global = globalOptions(command);
      try {
        const runtime = buildRuntime(global);
        const rawWeight = options["feedbackWeight"];
        const feedbackWeight = typeof rawWeight === "string" ? Number(rawWeight) : runtime.config.feedbackWeight;

        const result = await runtime.pipeline.retrain({
          feedbackWeight,
          refitVectorizer: Boolean(options["refitVectorizer"]),
        });
        console.log(formatTrainingResult(result));
      } catch (error) {
        exitWithError(error);
      }
    });

  program
    .command("version")
    .description("Show the current model version")
    .action(async (_options: Record<string, unknown>, command: Command) => {
      try {
        const runtime = buildRuntime(globalOptions(command));
        const versionId = unwrap(await runtime.service.getCurrentVersion());
        const all = await runtime.registry.listVersions();
        console.log(`v${versionId}`);
        if (all.length > 1) {
          console.log(`registered: ${all.map((id) => `v${id}`).join(", ")}`);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
