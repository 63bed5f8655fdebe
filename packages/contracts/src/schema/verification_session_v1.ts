import { z } from "zod";

import { EligibilityVerdictV1Z } from "./eligibility_verdict_v1";

// Which routing decision the session is waiting to record.
export const RoutingKindV1Z = z.enum(["qualified", "disqualified_contactable"]);
export type RoutingKindV1 = z.infer<typeof RoutingKindV1Z>;

export const VERIFICATION_CODE_RE_V1 = /^\d{4}$/;

/**
 * Target board handle consumed by the external recorder.
 * Opaque to the intake flow: ids and column names are passed through, never interpreted.
 */
export const BoardHandleV1Z = z
  .object({
    board_id: z.string().min(1),
    column_mappings: z.record(z.string().min(1)), // answer field -> board column
    allowed_tags: z.array(z.string().min(1)) // tag vocabulary the board accepts
  })
  .strict();

export type BoardHandleV1 = z.infer<typeof BoardHandleV1Z>;

export const VerificationSessionV1Z = z
  .object({
    session_id: z.string().min(1),
    study_id: z.string().min(1),
    code: z.string().regex(VERIFICATION_CODE_RE_V1), // one-time numeric code
    answers: z.record(z.string()), // frozen normalized snapshot
    routing_kind: RoutingKindV1Z,
    routing_bucket: z.string().min(1), // opaque bucket label for the recorder
    verdict: EligibilityVerdictV1Z,
    notes_text: z.string(), // IP metadata lines, may be empty
    board: BoardHandleV1Z,
    form_title: z.string().min(1),
    created_at_ts: z.number().int().nonnegative(), // unix ms
    expires_at_ts: z.number().int().nonnegative() // unix ms
  })
  .strict()
  .refine((v) => v.expires_at_ts > v.created_at_ts, {
    message: "expires_at_ts must be > created_at_ts"
  });

export type VerificationSessionV1 = z.infer<typeof VerificationSessionV1Z>;
