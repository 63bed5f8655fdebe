// Contracts of the external collaborators the intake flow calls.
// Retry policy, timeouts and transport belong to the adapters behind these.

import type { ApplicantAnswersV1 } from "@trial-intake/contracts";
import type { GeoPointV1 } from "@trial-intake/eligibility-kernel";

export interface DuplicateChecker {
  checkDuplicateEmail(email: string, boardId: string): Promise<boolean>;
}

export interface Geocoder {
  // null when the text resolves to nothing
  geocode(locationText: string): Promise<GeoPointV1 | null>;
}

export interface IpMetadataLookup {
  // free-form keys: ip, city, region, country, org
  lookupIpMetadata(ip: string): Promise<Readonly<Record<string, string>>>;
}

export type SmsSendResultV1 = { ok: true } | { ok: false; error: string };

export interface SmsSender {
  sendOneTimeCode(phoneE164: string, body: string): Promise<SmsSendResultV1>;
}

export type OutcomeRecordV1 = {
  answers: ApplicantAnswersV1;
  routing_bucket: string;
  qualified: boolean;
  tags: ReadonlyArray<string>; // already filtered to allowed_tags
  notes_text: string;
  board_id: string;
  column_mappings: Readonly<Record<string, string>>;
  allowed_tags: ReadonlyArray<string>;
};

export interface OutcomeRecorder {
  recordOutcome(record: OutcomeRecordV1): Promise<unknown>;
}

export type IntakeCollaboratorsV1 = {
  duplicates: DuplicateChecker;
  geocoder: Geocoder;
  ipLookup: IpMetadataLookup;
  sms: SmsSender;
  recorder: OutcomeRecorder;
};
