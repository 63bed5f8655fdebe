// Collaborators for local runs: every call is logged, nothing leaves the process.

import type { GeoPointV1 } from "@trial-intake/eligibility-kernel";

import type { Logger } from "../log";
import type { IntakeCollaboratorsV1, OutcomeRecordV1, SmsSendResultV1 } from "./types";

export class LoggingCollaborators {
  constructor(private readonly logger: Logger) {}

  async checkDuplicateEmail(email: string, boardId: string): Promise<boolean> {
    this.logger.info({ email, board_id: boardId }, "duplicate check (logging only): not a duplicate");
    return false;
  }

  async geocode(locationText: string): Promise<GeoPointV1 | null> {
    this.logger.info({ location: locationText }, "geocode (logging only): no result");
    return null;
  }

  async lookupIpMetadata(ip: string): Promise<Readonly<Record<string, string>>> {
    this.logger.info({ ip }, "ip lookup (logging only): no metadata");
    return {};
  }

  async sendOneTimeCode(phoneE164: string, body: string): Promise<SmsSendResultV1> {
    this.logger.info({ to: phoneE164, body }, "sms (logging only)");
    return { ok: true };
  }

  async recordOutcome(record: OutcomeRecordV1): Promise<unknown> {
    this.logger.info(
      { board_id: record.board_id, bucket: record.routing_bucket, qualified: record.qualified, tags: record.tags },
      "record outcome (logging only)"
    );
    return { ok: true };
  }

  asCollaborators(): IntakeCollaboratorsV1 {
    return { duplicates: this, geocoder: this, ipLookup: this, sms: this, recorder: this };
  }
}
