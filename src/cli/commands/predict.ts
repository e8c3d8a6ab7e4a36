/**
 * Predict command - classify a text with the current model
 */

import { unwrap } from "../../lib/index.js";
import { formatPrediction } from "../formatters.js";
import { buildRuntime, exitWithError, globalOptions } from "../shared.js";

import type { Command } from "commander";

export function registerPredictCommand(program: Command): void {
  program
    .command("predict <text>")
    .description("Classify a text with the current model")
    .option("--json", "Print the prediction as JSON")
    .action(async (text: string, options: Record<string, unknown>, command: Command) => {
      try {
        const runtime = buildRuntime(globalOptions(command));
        const prediction = unwrap(await runtime.service.predict(text));
        console.log(
          options["json"] === true
            ? JSON.stringify({ prediction: prediction.label, confidence: prediction.confidence, model_version: `v${prediction.versionId}` })
            : formatPrediction(prediction)
        );
      } catch (error) {
        exitWithError(error);
      }
    });
}
