import { z } from "zod";

// Form posts arrive as loosely typed JSON; scalar answers are kept as strings.
// null marks a question left unanswered (an unchecked radio group) and is dropped.
const AnswerValueZ = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const QualifyFormBodyV1Z = z.record(AnswerValueZ).transform((raw) => {
  const answers: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (v !== null) answers[k] = String(v);
  }
  return answers;
});

// Extra keys are ignored.
export const VerifyCodeBodyV1Z = z.object({
  submission_id: z.string().min(1),
  code: z.union([z.string(), z.number()]).transform((v) => String(v).trim())
});

