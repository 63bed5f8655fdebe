// Qualification orchestrator.
//
// Fixed sequence per submission; every step can end the flow:
//   study lookup -> normalize -> validate -> duplicate check -> geocode
//   -> evaluate -> route -> (verification: ip notes, code, session, sms)
//
// Duplicate check, geocoding and IP lookup fail open. SMS failure is fatal to the
// submission and discards its session.

import { CONSENT_CONFIRMED_V1 } from "@trial-intake/contracts";
import type {
  ApplicantAnswersV1,
  EligibilityVerdictV1,
  RoutingKindV1,
  SubmissionOutcomeV1,
  VerificationSessionV1
} from "@trial-intake/contracts";
import { TAG_DUPLICATE, evaluateEligibilityV1, normalizeAnswersV1 } from "@trial-intake/eligibility-kernel";
import type { DerivedFactsV1, EligibilityRuleV1, GeoPointV1 } from "@trial-intake/eligibility-kernel";
import type { StudyConfigV1 } from "@trial-intake/study-config-validator";

import { formatIpNotes } from "../collaborators/ip_notes";
import type { IntakeCollaboratorsV1, OutcomeRecordV1 } from "../collaborators/types";
import type { StudyRegistry } from "../config/study_registry";
import type { Logger } from "../log";
import type { VerificationSessionStore } from "../session/types";
import { errorMessage, newSessionId, newVerificationCode, nowMs } from "../util";
import { validateSubmissionV1 } from "../validation/submission";
import {
  DUPLICATE_MESSAGE,
  INTERNAL_ERROR_MESSAGE,
  disqualifiedFinalMessage,
  renderCodePrompt,
  smsFailedMessage,
  studyNotFoundMessage
} from "./messages";
import { filterAllowedTags } from "./tags";

export const DEFAULT_SESSION_TTL_MS = 15 * 60 * 1000;

export type EligibilityEvaluatorV1 = (
  rules: ReadonlyArray<EligibilityRuleV1>,
  answers: ApplicantAnswersV1,
  facts: DerivedFactsV1
) => EligibilityVerdictV1;

export type QualificationDepsV1 = {
  studies: StudyRegistry;
  sessions: VerificationSessionStore;
  collaborators: IntakeCollaboratorsV1;
  logger: Logger;
  clock?: () => number;
  sessionTtlMs?: number;
  newSessionId?: () => string;
  newCode?: () => string;
  evaluate?: EligibilityEvaluatorV1;
};

type RoutingDecision = { kind: RoutingKindV1; bucket: string; message: string };

export class QualificationOrchestrator {
  private readonly clock: () => number;
  private readonly ttlMs: number;
  private readonly makeSessionId: () => string;
  private readonly makeCode: () => string;
  private readonly evaluate: EligibilityEvaluatorV1;

  constructor(private readonly deps: QualificationDepsV1) {
    this.clock = deps.clock ?? nowMs;
    this.ttlMs = deps.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.makeSessionId = deps.newSessionId ?? newSessionId;
    this.makeCode = deps.newCode ?? newVerificationCode;
    this.evaluate =
      deps.evaluate ?? ((rules, answers, facts) => evaluateEligibilityV1(rules, answers, facts, { logger: deps.logger }));
  }

  async processSubmission(
    rawAnswers: Readonly<Record<string, string>>,
    studyId: string,
    sourceIp?: string
  ): Promise<SubmissionOutcomeV1> {
    const log = this.deps.logger.child({ study_id: studyId });

    try {
      const study = this.deps.studies.get(studyId);
      if (!study) {
        log.error("STUDY_NOT_FOUND: submission refused");
        return { status: "internal_error", message: studyNotFoundMessage(studyId) };
      }
      return await this.qualify(study, rawAnswers, sourceIp, log);
    } catch (e) {
      log.error({ err: e }, "qualification failed");
      return { status: "internal_error", message: INTERNAL_ERROR_MESSAGE };
    }
  }

  private async qualify(
    study: StudyConfigV1,
    rawAnswers: Readonly<Record<string, string>>,
    sourceIp: string | undefined,
    log: Logger
  ): Promise<SubmissionOutcomeV1> {
    const stamped: Record<string, string> = { ...rawAnswers, study_id: study.study_id };
    if (sourceIp) stamped.ip = sourceIp;
    const answers = normalizeAnswersV1(stamped, study.field_families);

    const checked = validateSubmissionV1(answers, this.clock());
    if (!checked.ok) {
      log.info({ reason: checked.reason }, "submission rejected");
      return { status: "rejected", reason: checked.reason };
    }
    const submission = checked.value;

    if (await this.isDuplicate(study, submission.email, log)) {
      this.recordDuplicateAttempt(study, answers, log);
      return { status: "duplicate", message: DUPLICATE_MESSAGE };
    }

    const coords = await this.geocode(submission.city_state, log);
    const verdict = this.evaluate(study.rules, answers, { age: submission.age, coords });
    log.info({ qualified: verdict.qualified, reasons: verdict.reasons, tags: verdict.tags }, "eligibility evaluated");

    const routing = this.route(study, answers, verdict);
    if (!routing) {
      return { status: "disqualified_final", message: disqualifiedFinalMessage(verdict.reasons) };
    }

    const notesText = sourceIp ? await this.ipNotes(sourceIp, log) : "";
    const now = this.clock();
    const session: VerificationSessionV1 = {
      session_id: this.makeSessionId(),
      study_id: study.study_id,
      code: this.makeCode(),
      answers: { ...answers },
      routing_kind: routing.kind,
      routing_bucket: routing.bucket,
      verdict: { qualified: verdict.qualified, reasons: [...verdict.reasons], tags: [...verdict.tags] },
      notes_text: notesText,
      board: {
        board_id: study.routing.board_id,
        column_mappings: { ...study.routing.column_mappings },
        allowed_tags: [...study.allowed_tags]
      },
      form_title: study.form_title,
      created_at_ts: now,
      expires_at_ts: now + this.ttlMs
    };
    const sessionId = await this.deps.sessions.create(session);

    const body = renderCodePrompt(study.sms_messages.code_prompt, session.code);
    const sent = await this.deps.collaborators.sms
      .sendOneTimeCode(submission.phone_e164, body)
      .catch((e: unknown) => ({ ok: false as const, error: errorMessage(e) }));
    if (!sent.ok) {
      await this.deps.sessions.delete(sessionId);
      log.error({ session_id: sessionId, error: sent.error }, "SMS_SEND_FAILED: session discarded");
      return { status: "internal_error", message: smsFailedMessage(sent.error) };
    }

    log.info({ session_id: sessionId, routing_kind: routing.kind }, "verification required");
    return { status: "verification_required", session_id: sessionId, message: routing.message };
  }

  /**
   * Null when the submission ends here (ineligible, no future-contact consent).
   */
  private route(study: StudyConfigV1, answers: ApplicantAnswersV1, verdict: EligibilityVerdictV1): RoutingDecision | null {
    if (verdict.qualified) {
      return { kind: "qualified", bucket: study.routing.qualified, message: study.sms_messages.qualified };
    }
    if (answers.future_study_consent === CONSENT_CONFIRMED_V1) {
      return {
        kind: "disqualified_contactable",
        bucket: study.routing.disqualified,
        message: study.sms_messages.future_consent
      };
    }
    return null;
  }

  private async isDuplicate(study: StudyConfigV1, email: string, log: Logger): Promise<boolean> {
    try {
      return await this.deps.collaborators.duplicates.checkDuplicateEmail(email, study.routing.board_id);
    } catch (e) {
      log.warn({ err: e }, "duplicate check failed; treating as not a duplicate");
      return false;
    }
  }

  private async geocode(locationText: string, log: Logger): Promise<GeoPointV1 | null> {
    try {
      return await this.deps.collaborators.geocoder.geocode(locationText);
    } catch (e) {
      log.warn({ err: e, location: locationText }, "geocode failed; location unknown");
      return null;
    }
  }

  private async ipNotes(ip: string, log: Logger): Promise<string> {
    try {
      return formatIpNotes(await this.deps.collaborators.ipLookup.lookupIpMetadata(ip));
    } catch (e) {
      log.warn({ err: e, ip }, "ip lookup failed; notes left empty");
      return "";
    }
  }

  // Best effort, off the response path.
  private recordDuplicateAttempt(study: StudyConfigV1, answers: ApplicantAnswersV1, log: Logger): void {
    const record: OutcomeRecordV1 = {
      answers: { email: answers.email ?? "", name: answers.name ?? "Duplicate Form", source: "Form Submission" },
      routing_bucket: study.routing.duplicate,
      qualified: false,
      tags: filterAllowedTags([TAG_DUPLICATE], study.allowed_tags),
      notes_text: "",
      board_id: study.routing.board_id,
      column_mappings: study.routing.column_mappings,
      allowed_tags: study.allowed_tags
    };
    void Promise.resolve()
      .then(() => this.deps.collaborators.recorder.recordOutcome(record))
      .then(
        () => log.info("duplicate attempt recorded"),
        (e: unknown) => log.warn({ err: e }, "duplicate attempt not recorded")
      );
  }
}
