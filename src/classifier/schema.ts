import { z } from "zod";

export const ARTIFACT_FORMAT_VERSION = 1;

/**
 * Serialized TF-IDF vectorizer
 */
export const TfidfArtifactSchema = z
  .object({
    kind: z.literal("tfidf"),
    formatVersion: z.literal(ARTIFACT_FORMAT_VERSION),
    maxFeatures: z.number().int().positive(),
    ngramRange: z.tuple([z.number().int().positive(), z.number().int().positive()]),
    minDf: z.number().int().nonnegative(),
    maxDf: z.number().gt(0).lte(1),
    vocabulary: z.record(z.string(), z.number().int().nonnegative()),
    idf: z.array(z.number()),
  })
  .superRefine((artifact, ctx) => {
    const size = artifact.idf.length;
    for (const [term, index] of Object.entries(artifact.vocabulary)) {
      if (index >= size) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Vocabulary index ${index} for "${term}" exceeds idf length ${size}`,
          path: ["vocabulary", term],
        });
        return;
      }
    }
  });

/**
 * Serialized softmax regression classifier
 */
export const SoftmaxArtifactSchema = z
  .object({
    kind: z.literal("softmax-regression"),
    formatVersion: z.literal(ARTIFACT_FORMAT_VERSION),
    classCount: z.number().int().positive(),
    featureCount: z.number().int().nonnegative(),
    c: z.number().positive(),
    maxIter: z.number().int().positive(),
    learningRate: z.number().positive(),
    weights: z.array(z.array(z.number())),
    intercepts: z.array(z.number()),
  })
  .superRefine((artifact, ctx) => {
    if (artifact.weights.length !== artifact.classCount || artifact.intercepts.length !== artifact.classCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${artifact.classCount} weight rows and intercepts`,
      });
    }
    if (artifact.weights.some((row) => row.length !== artifact.featureCount)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Every weight row must have ${artifact.featureCount} columns`,
        path: ["weights"],
      });
    }
  });

export type TfidfArtifact = z.infer<typeof TfidfArtifactSchema>;
export type SoftmaxArtifact = z.infer<typeof SoftmaxArtifactSchema>;
