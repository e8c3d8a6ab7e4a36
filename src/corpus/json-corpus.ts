import { readFile } from "fs/promises";

import { z } from "zod";

import { ValidationError } from "../lib/errors.js";
import { isNotFound } from "../lib/files.js";
import { LabelSchemaSchema } from "../lib/labels.js";
import { logger } from "../lib/logger.js";

import type { Corpus, CorpusSource } from "./types.js";

const log = logger.child("[corpus]");

const ExampleSchema = z.object({
  text: z.string(),
  label: z.number().int().nonnegative(),
});

/**
 * On-disk corpus document
 */
export const CorpusFileSchema = z.object({
  labelNames: LabelSchemaSchema,
  train: z.array(ExampleSchema).min(1, "Training split cannot be empty"),
  test: z.array(ExampleSchema).min(1, "Test split cannot be empty"),
});

export type CorpusFile = z.infer<typeof CorpusFileSchema>;

/**
 * Split a corpus document into parallel arrays, checking every label id
 */
export function toCorpus(file: CorpusFile): Corpus {
  const size = file.labelNames.length;
  for (const [split, examples] of [["train", file.train], ["test", file.test]] as const) {
    const index = examples.findIndex((example) => example.label >= size);
    if (index !== -1) {
      throw new ValidationError(`Label ${examples[index]?.label} in ${split}[${index}] is outside the label schema`, {
        split,
        index,
        labelCount: size,
      });
    }
  }

  return {
    trainTexts: file.train.map((example) => example.text),
    trainLabels: file.train.map((example) => example.label),
    testTexts: file.test.map((example) => example.text),
    testLabels: file.test.map((example) => example.label),
    labelNames: [...file.labelNames],
  };
}

/**
 * Corpus read from a JSON document: `{ labelNames, train: [{text, label}], test: [...] }`
 */
export class JsonCorpusSource implements CorpusSource {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Corpus> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        log.debug(`No corpus at ${this.filePath}`);
        throw new ValidationError("Corpus file not found");
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(`Corpus file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = CorpusFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError("Invalid corpus file", { issues: parsed.error.issues });
    }
    return toCorpus(parsed.data);
  }
}

/**
 * Corpus held in memory
 */
export class InMemoryCorpusSource implements CorpusSource {
  constructor(private readonly corpus: Corpus) {}

  load(): Promise<Corpus> {
    return Promise.resolve({
      trainTexts: [...this.corpus.trainTexts],
      trainLabels: [...this.corpus.trainLabels],
      testTexts: [...this.corpus.testTexts],
      testLabels: [...this.corpus.testLabels],
      labelNames: [...this.corpus.labelNames],
    });
  }
}
