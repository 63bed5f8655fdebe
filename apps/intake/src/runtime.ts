import type { SubmissionOutcomeV1, VerificationOutcomeV1 } from "@trial-intake/contracts";
import type { FieldSpecV1 } from "@trial-intake/study-config-validator";

import type { StudyRegistry } from "./config/study_registry";
import type { Logger } from "./log";
import { QualificationOrchestrator } from "./orchestrator/qualification";
import type { QualificationDepsV1 } from "./orchestrator/qualification";
import { VerificationService } from "./orchestrator/verification";
import type { VerificationSessionStore } from "./session/types";
import { nowMs } from "./util";

export type StudyFormV1 = {
  study_id: string;
  form_title: string;
  study_summary: string | null;
  fields: ReadonlyArray<FieldSpecV1>;
};

export type IntakeRuntimeDepsV1 = QualificationDepsV1 & {
  sweepIntervalMs?: number;
};

/**
 * Wires the intake flow for one process: qualification, verification and the
 * expired-session sweeper share one session store.
 */
export class IntakeRuntime {
  private readonly qualification: QualificationOrchestrator;
  private readonly verification: VerificationService;
  private readonly studies: StudyRegistry;
  private readonly sessions: VerificationSessionStore;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly sweepIntervalMs: number;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(deps: IntakeRuntimeDepsV1) {
    this.qualification = new QualificationOrchestrator(deps);
    this.verification = new VerificationService({
      sessions: deps.sessions,
      recorder: deps.collaborators.recorder,
      logger: deps.logger
    });
    this.studies = deps.studies;
    this.sessions = deps.sessions;
    this.logger = deps.logger;
    this.clock = deps.clock ?? nowMs;
    this.sweepIntervalMs = deps.sweepIntervalMs ?? 60_000;
  }

  processSubmission(rawAnswers: Readonly<Record<string, string>>, studyId: string, sourceIp?: string): Promise<SubmissionOutcomeV1> {
    return this.qualification.processSubmission(rawAnswers, studyId, sourceIp);
  }

  completeVerification(sessionId: string, code: string): Promise<VerificationOutcomeV1> {
    return this.verification.completeVerification(sessionId, code);
  }

  getStudyForm(studyId: string): StudyFormV1 | undefined {
    const study = this.studies.get(studyId);
    if (!study) return undefined;
    return {
      study_id: study.study_id,
      form_title: study.form_title,
      study_summary: study.study_summary ?? null,
      fields: study.fields
    };
  }

  async sweepExpiredSessions(): Promise<number> {
    const removed = await this.sessions.sweepExpired(this.clock());
    if (removed > 0) this.logger.info({ removed }, "expired verification sessions swept");
    return removed;
  }

  startSweeper(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      this.sweepExpiredSessions().catch((e: unknown) => this.logger.error({ err: e }, "session sweep failed"));
    }, this.sweepIntervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    this.sessions.close();
  }
}
