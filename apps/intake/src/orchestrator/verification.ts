// Verification completion.
//
// The session is claimed (deleted) before the recorder runs, so two concurrent
// completions with the right code record at most once.

import type { VerificationOutcomeV1, VerificationSessionV1 } from "@trial-intake/contracts";

import type { OutcomeRecorder, OutcomeRecordV1 } from "../collaborators/types";
import type { Logger } from "../log";
import type { VerificationSessionStore } from "../session/types";
import {
  CODE_MISMATCH_MESSAGE,
  CONTACTABLE_CONFIRMED_MESSAGE,
  SESSION_NOT_FOUND_MESSAGE,
  qualifiedConfirmedMessage
} from "./messages";
import { filterAllowedTags } from "./tags";

export type VerificationDepsV1 = {
  sessions: VerificationSessionStore;
  recorder: OutcomeRecorder;
  logger: Logger;
};

export function outcomeRecordOf(session: VerificationSessionV1): OutcomeRecordV1 {
  return {
    answers: session.answers,
    routing_bucket: session.routing_bucket,
    qualified: session.verdict.qualified,
    tags: filterAllowedTags(session.verdict.tags, session.board.allowed_tags),
    notes_text: session.notes_text,
    board_id: session.board.board_id,
    column_mappings: session.board.column_mappings,
    allowed_tags: session.board.allowed_tags
  };
}

export class VerificationService {
  constructor(private readonly deps: VerificationDepsV1) {}

  async completeVerification(sessionId: string, code: string): Promise<VerificationOutcomeV1> {
    const log = this.deps.logger.child({ session_id: sessionId });

    const claimed = await this.deps.sessions.claim(sessionId, code);
    switch (claimed.status) {
      case "not_found":
        log.info("verification session not found");
        return { status: "not_found", message: SESSION_NOT_FOUND_MESSAGE };
      case "mismatched":
        log.info("verification code mismatch");
        return { status: "mismatched", message: CODE_MISMATCH_MESSAGE };
      case "matched":
        return this.record(claimed.session, log);
      default: {
        const _never: never = claimed;
        throw new Error(`UNREACHABLE_CLAIM_STATUS: ${String(_never)}`);
      }
    }
  }

  private async record(session: VerificationSessionV1, log: Logger): Promise<VerificationOutcomeV1> {
    const record = outcomeRecordOf(session);
    try {
      await this.deps.recorder.recordOutcome(record);
      log.info({ study_id: session.study_id, bucket: record.routing_bucket, tags: record.tags }, "outcome recorded");
    } catch (e) {
      log.error({ err: e, study_id: session.study_id }, "RECORD_OUTCOME_FAILED: confirmation kept");
    }

    const qualified = session.verdict.qualified;
    return {
      status: "matched",
      qualified,
      message: qualified ? qualifiedConfirmedMessage(session.form_title) : CONTACTABLE_CONFIRMED_MESSAGE
    };
  }
}
