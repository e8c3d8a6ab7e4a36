import { Command } from "commander";

import { VERSION } from "../version.js";

import { registerFeedbackCommands } from "./commands/feedback.js";
import { registerMetricsCommands } from "./commands/metrics.js";
import { registerPredictCommand } from "./commands/predict.js";
import { registerServeCommand } from "./commands/serve.js";
import { registerTrainCommands } from "./commands/train.js";

/**
 * Build the relabel command tree
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("relabel")
    .description("Human-in-the-loop text classification: serve, collect feedback, retrain")
    .version(VERSION)
    .option("-d, --data-dir <dir>", "Data directory (models, feedback, metrics)")
    .option("--corpus <path>", "Corpus JSON file")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)");

  registerTrainCommands(program);
  registerPredictCommand(program);
  registerFeedbackCommands(program);
  registerMetricsCommands(program);
  registerServeCommand(program);

  return program;
}
