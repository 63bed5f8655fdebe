/**
 * Applicant fields the intake flow reads directly, whatever the study.
 *
 * Rule references to these names are always admissible, even when a study's
 * field list does not declare them (e.g. `ip` and `study_id` are stamped by the service).
 */
export const WELL_KNOWN_APPLICANT_FIELDS_V1 = Object.freeze([
  "name",
  "email",
  "phone",
  "dob",
  "city_state",
  "handedness",
  "future_study_consent",
  "study_id",
  "ip"
] as const);

export const CONSENT_CONFIRMED_V1 = "I, confirm";
export const CONSENT_DECLINED_V1 = "I, do not confirm";

// Mapping from field name to normalized string value.
export type ApplicantAnswersV1 = Readonly<Record<string, string>>;
