import { z } from "zod";

export const ClassMetricsSchema = z.object({
  precision: z.number(),
  recall: z.number(),
  f1: z.number(),
  support: z.number().int().nonnegative(),
});

/**
 * Evaluation metrics of one model version on the held-out test split
 */
export const MetricsRecordSchema = z
  .object({
    accuracy: z.number(),
    f1Macro: z.number(),
    f1Weighted: z.number(),
    /** Keyed by label name, in schema order */
    perClass: z.record(z.string(), ClassMetricsSchema),
    /** Rows are true labels, columns predicted labels, both in schema order */
    confusionMatrix: z.array(z.array(z.number().int().nonnegative())),
    labelNames: z.array(z.string()),
  })
  .superRefine((record, ctx) => {
    const size = record.labelNames.length;
    if (record.confusionMatrix.length !== size || record.confusionMatrix.some((row) => row.length !== size)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Confusion matrix must be ${size}x${size}`,
        path: ["confusionMatrix"],
      });
    }
  });

export type ClassMetrics = z.infer<typeof ClassMetricsSchema>;
export type MetricsRecord = z.infer<typeof MetricsRecordSchema>;

/**
 * Headline numbers used when comparing versions
 */
export interface MetricsSummary {
  accuracy: number;
  f1Macro: number;
  f1Weighted: number;
}
