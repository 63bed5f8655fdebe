import type { EligibilityRuleV1, FieldFamiliesV1, GeoTargetV1 } from "@trial-intake/eligibility-kernel";

import type { FieldSpecV1, RoutingV1 } from "./study_config_v1_zod";

export type SmsMessagesV1 = {
  readonly qualified: string;
  readonly future_consent: string;
  readonly code_prompt: string; // contains {code}
};

/**
 * Admitted study configuration. Deep-frozen; rules are materialized for the kernel
 * (age minimum filled in, distance target attached, unknown kinds marked).
 */
export type StudyConfigV1 = {
  readonly type: "study_config_v1";
  readonly schema_version: string;
  readonly study_id: string;
  readonly form_title: string;
  readonly study_summary?: string;
  readonly fields: ReadonlyArray<FieldSpecV1>;
  readonly rules: ReadonlyArray<EligibilityRuleV1>;
  readonly min_age: number;
  readonly geo_target?: GeoTargetV1;
  readonly allowed_tags: ReadonlyArray<string>;
  readonly routing: RoutingV1;
  readonly sms_messages: SmsMessagesV1;
  readonly field_families: FieldFamiliesV1;
};

export type StudyConfigIssueCodeV1 =
  | "INVALID_SCHEMA"
  | "DUPLICATE_FIELD"
  | "DUPLICATE_RULE_ID"
  | "UNKNOWN_FIELD_REF"
  | "MISSING_GEO_TARGET";

export type StudyConfigIssueV1 = {
  code: StudyConfigIssueCodeV1;
  path: string;
  message: string;
};
