import type { FastifyInstance } from "fastify";

import { QualifyFormBodyV1Z, VerifyCodeBodyV1Z } from "@trial-intake/contracts";
import type { SubmissionStatusV1, VerificationOutcomeV1 } from "@trial-intake/contracts";

import type { IntakeRuntime } from "./runtime";

export const MISSING_STUDY_ID_MESSAGE = "Missing study_id in form submission.";
export const INVALID_FORM_MESSAGE = "Form submission must be a flat object of answers.";
export const INVALID_VERIFY_MESSAGE = "submission_id and code are required.";

const SUBMISSION_HTTP_STATUS: { readonly [S in SubmissionStatusV1]: number } = {
  rejected: 400,
  duplicate: 200,
  disqualified_final: 200,
  verification_required: 200,
  internal_error: 500
};

const VERIFICATION_HTTP_STATUS: { readonly [S in VerificationOutcomeV1["status"]]: number } = {
  matched: 200,
  mismatched: 400,
  not_found: 404
};

export function registerIntakeRoutes(app: FastifyInstance, runtime: IntakeRuntime): void {
  app.get("/health", async (_req, reply) => reply.send({ ok: true }));

  app.post("/qualify_form", async (req, reply) => {
    const parsed = QualifyFormBodyV1Z.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ status: "rejected", reason: INVALID_FORM_MESSAGE });
    }
    const answers = parsed.data;
    const studyId = answers.study_id?.trim();
    if (!studyId) {
      return reply.code(400).send({ status: "rejected", reason: MISSING_STUDY_ID_MESSAGE });
    }

    const outcome = await runtime.processSubmission(answers, studyId, req.ip);
    return reply.code(SUBMISSION_HTTP_STATUS[outcome.status]).send(outcome);
  });

  app.post("/verify_code", async (req, reply) => {
    const parsed = VerifyCodeBodyV1Z.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ ok: false, error: INVALID_VERIFY_MESSAGE });
    }

    const outcome = await runtime.completeVerification(parsed.data.submission_id, parsed.data.code);
    return reply.code(VERIFICATION_HTTP_STATUS[outcome.status]).send(outcome);
  });

  app.get<{ Params: { studyId: string } }>("/api/studies/:studyId/form", async (req, reply) => {
    const form = runtime.getStudyForm(req.params.studyId);
    if (!form) {
      return reply.code(404).send({ ok: false, error: `STUDY_NOT_FOUND: ${req.params.studyId}` });
    }
    return reply.send(form);
  });
}
