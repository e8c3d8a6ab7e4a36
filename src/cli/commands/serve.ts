/**
 * Serve command - run the HTTP prediction API
 */

import { logger } from "../../lib/index.js";
import { createApp } from "../../serving/index.js";
import { buildRuntime, exitWithError, globalOptions, parsePositiveInt } from "../shared.js";

import type { Command } from "commander";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Serve predictions and collect feedback over HTTP")
    .option("-p, --port <port>", "Port to listen on")
    .action(async (options: Record<string, unknown>, command: Command) => {
      try {
        const runtime = buildRuntime(globalOptions(command));
        const port = typeof options["port"] === "string"
          ? parsePositiveInt(options["port"], "--port")
          : runtime.config.port;

        // Load eagerly; a missing model is not fatal and is retried on the first request
        const model = await runtime.handle.get();
        if (!model.success) {
          logger.warn(`Could not load model on startup: ${model.error.message}`);
        }

        const app = createApp(runtime.service);
        app.listen(port, () => {
          logger.success(`Listening on http://localhost:${port}`);
        });
      } catch (error) {
        exitWithError(error);
      }
    });
}
