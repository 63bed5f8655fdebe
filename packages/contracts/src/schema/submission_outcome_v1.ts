import { z } from "zod";

/**
 * Outcome of one form submission.
 *
 * - rejected: malformed input, message shown verbatim
 * - duplicate: email already on the study board
 * - disqualified_final: ineligible without future-contact consent, nothing recorded
 * - verification_required: a code was sent; recording waits for confirmation
 * - internal_error: configuration or collaborator failure
 */
export const SubmissionOutcomeV1Z = z.discriminatedUnion("status", [
  z.object({ status: z.literal("rejected"), reason: z.string().min(1) }).strict(),
  z.object({ status: z.literal("duplicate"), message: z.string().min(1) }).strict(),
  z.object({ status: z.literal("disqualified_final"), message: z.string().min(1) }).strict(),
  z
    .object({
      status: z.literal("verification_required"),
      session_id: z.string().min(1),
      message: z.string().min(1)
    })
    .strict(),
  z.object({ status: z.literal("internal_error"), message: z.string().min(1) }).strict()
]);

export type SubmissionOutcomeV1 = z.infer<typeof SubmissionOutcomeV1Z>;
export type SubmissionStatusV1 = SubmissionOutcomeV1["status"];

export const VerificationOutcomeV1Z = z.discriminatedUnion("status", [
  z.object({ status: z.literal("matched"), qualified: z.boolean(), message: z.string().min(1) }).strict(),
  z.object({ status: z.literal("mismatched"), message: z.string().min(1) }).strict(),
  z.object({ status: z.literal("not_found"), message: z.string().min(1) }).strict()
]);

export type VerificationOutcomeV1 = z.infer<typeof VerificationOutcomeV1Z>;
