/**
 * Feedback commands - record, list and summarize human corrections
 */

import { generateReport, summarize } from "../../feedback/index.js";
import { unwrap } from "../../lib/index.js";
import { formatFeedbackList, formatSuccess } from "../formatters.js";
import { buildRuntime, exitWithError, globalOptions, parsePositiveInt } from "../shared.js";

import type { Command } from "commander";

export function registerFeedbackCommands(program: Command): void {
  const feedback = program.command("feedback").description("Manage human feedback");

  feedback
    .command("add <text>")
    .description("Record a corrected label for a text")
    .requiredOption("-l, --label <label>", "Correct label")
    .option("-p, --prediction <label>", "Label the model predicted")
    .action(async (text: string, options: Record<string, unknown>, command: Command) => {
      try {
        const runtime = buildRuntime(globalOptions(command));
        const record = unwrap(
          await runtime.service.submitFeedback({
            text,
            humanLabel: String(options["label"] ?? ""),
            modelPrediction: typeof options["prediction"] === "string" ? options["prediction"] : undefined,
          })
        );
        console.log(formatSuccess(`Feedback recorded at ${record.timestamp}`));
      } catch (error) {
        exitWithError(error);
      }
    });

  feedback
    .command("list")
    .description("List recorded feedback")
    .option("-n, --limit <n>", "Show only the most recent n records")
    .action(async (options: Record<string, unknown>, command: Command) => {
      try {
        const runtime = buildRuntime(globalOptions(command));
        const records = await runtime.feedback.loadAll();
        const limit = typeof options["limit"] === "string" ? parsePositiveInt(options["limit"], "--limit") : undefined;
        console.log(formatFeedbackList(limit === undefined ? records : records.slice(-limit)));
      } catch (error) {
        exitWithError(error);
      }
    });

  feedback
    .command("stats")
    .description("Summarize recorded feedback")
    .action(async (_options: Record<string, unknown>, command: Command) => {
      try {
        const runtime = buildRuntime(globalOptions(command));
        console.log(generateReport(summarize(await runtime.feedback.loadAll())));
      } catch (error) {
        exitWithError(error);
      }
    });
}
