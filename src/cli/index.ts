#!/usr/bin/env node
/**
 * relabel CLI entry point
 *
 * Commands:
 * - train-baseline - Train and promote model v1
 * - retrain        - Retrain with collected feedback
 * - predict        - Classify a text
 * - feedback       - Record, list and summarize corrections
 * - metrics        - Show metrics for a version
 * - compare        - Compare metrics across versions
 * - version        - Show the current model version
 * - serve          - Run the HTTP API
 */

import { createProgram } from "./program.js";
import { exitWithError } from "./shared.js";

createProgram().parseAsync().catch((error: unknown) => exitWithError(error));
