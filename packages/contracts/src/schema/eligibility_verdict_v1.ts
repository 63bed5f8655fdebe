import { z } from "zod"; // runtime schema for verdicts crossing a storage boundary

function uniqueStrings(label: string) {
  return (values: ReadonlyArray<string>, ctx: z.RefinementCtx): void => {
    const seen = new Set<string>();
    values.forEach((v, i) => {
      if (seen.has(v)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be de-duplicated: ${v}`, path: [i] });
      }
      seen.add(v);
    });
  };
}

export const EligibilityVerdictV1Z = z
  .object({
    qualified: z.boolean(), // overall verdict
    reasons: z.array(z.string().min(1)).superRefine(uniqueStrings("reasons")), // rule declaration order, first occurrence kept
    tags: z.array(z.string().min(1)).superRefine(uniqueStrings("tags")) // classification only, never a disqualifier
  })
  .strict();

export type EligibilityVerdictV1 = {
  readonly qualified: boolean;
  readonly reasons: ReadonlyArray<string>;
  readonly tags: ReadonlyArray<string>;
};
