/**
 * Human feedback types
 */

import { z } from "zod";

const nonBlank = (field: string) =>
  z.string({ required_error: `${field} is required` }).refine((value) => value.trim().length > 0, {
    message: `${field} cannot be empty`,
  });

/**
 * Feedback as submitted by a rater
 */
export const FeedbackInputSchema = z.object({
  /** Text that was classified */
  text: nonBlank("Text"),
  /** Label the model predicted (advisory, not checked against the schema) */
  modelPrediction: z.string().default(""),
  /** Corrected label */
  humanLabel: nonBlank("Human label"),
  /** Version that was live when the prediction was made */
  sourceModelVersion: z.number().int().positive().nullable().default(null),
});

/**
 * Feedback as stored. Blank fields are tolerated on read and filtered
 * out of the training projection instead.
 */
export const FeedbackRecordSchema = z.object({
  text: z.string(),
  modelPrediction: z.string(),
  humanLabel: z.string(),
  /** ISO-8601 acceptance time, stamped by the store */
  timestamp: z.string(),
  sourceModelVersion: z.number().int().positive().nullable(),
});

export type FeedbackInput = z.input<typeof FeedbackInputSchema>;
export type FeedbackRecord = z.infer<typeof FeedbackRecordSchema>;

/**
 * A feedback pair eligible for retraining
 */
export interface TrainingSample {
  text: string;
  humanLabel: string;
}

/**
 * Aggregate view of the feedback log
 */
export interface FeedbackSummary {
  total: number;
  /** Records whose human label differs from the model's prediction */
  corrections: number;
  /** Count per human label */
  byLabel: Record<string, number>;
  /** Count per source model version ("none" when no model was live) */
  byVersion: Record<string, number>;
  firstAt: string | null;
  lastAt: string | null;
}
