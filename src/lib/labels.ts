import { z } from "zod";

/**
 * First label name that occurs more than once, if any
 */
export function findDuplicateLabel(labels: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const label of labels) {
    if (seen.has(label)) return label;
    seen.add(label);
  }
  return undefined;
}

/**
 * Ordered, non-empty list of distinct label names; index = label id
 */
export const LabelSchemaSchema = z
  .array(z.string().min(1))
  .min(1)
  .superRefine((labels, ctx) => {
    const duplicate = findDuplicateLabel(labels);
    if (duplicate !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate label "${duplicate}"`,
      });
    }
  });
