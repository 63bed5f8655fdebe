// Eligibility Kernel - Field normalizer (v1)
//
// Canonicalizes free-text answers into the fixed vocabulary the rules compare against.
// Total: values that match nothing are returned unchanged.

import { CONSENT_CONFIRMED_V1, CONSENT_DECLINED_V1 } from "@trial-intake/contracts";
import type { ApplicantAnswersV1 } from "@trial-intake/contracts";

export const NORMALIZE_FAMILIES_V1 = ["yes_no", "yes_no_na", "handedness", "consent"] as const;
export type NormalizeFamilyV1 = (typeof NORMALIZE_FAMILIES_V1)[number];

export type FieldFamiliesV1 = Readonly<Record<string, NormalizeFamilyV1>>;

export const LEFT_HANDED = "Left-handed";
export const RIGHT_HANDED = "Right-handed";
export const NOT_APPLICABLE = "Not Applicable";

const YES_NO_FIELDS = [
  "tbi_year",
  "memory_issues",
  "english_fluent",
  "can_exercise",
  "can_mri",
  "ckd_gfr",
  "previous_bupropion",
  "current_depression_medication",
  "untreatable_cancer",
  "liver_disease",
  "seizure_disorder",
  "dialysis",
  "current_depression_therapy",
  "gfr_less_45"
];

/**
 * Questionnaire fields normalized even when a study does not declare a family for them.
 */
export const DEFAULT_FIELD_FAMILIES_V1: FieldFamiliesV1 = Object.freeze({
  ...Object.fromEntries(YES_NO_FIELDS.map((f): [string, NormalizeFamilyV1] => [f, "yes_no"])),
  handedness: "handedness",
  future_study_consent: "consent",
  kidney_transplant_6months: "yes_no_na"
});

function key(value: string): string {
  return value.trim().toLowerCase();
}

function normalizeYesNo(value: string): string {
  const k = key(value);
  if (k === "yes" || k === "y") return "Yes";
  if (k === "no" || k === "n") return "No";
  return value;
}

function normalizeNotApplicable(value: string): string {
  const k = key(value);
  if (k === "not applicable" || k === "n/a") return NOT_APPLICABLE;
  return value;
}

function normalizeHandedness(value: string): string {
  const k = key(value);
  if (k.includes("left")) return LEFT_HANDED;
  if (k.includes("right")) return RIGHT_HANDED;
  return value;
}

function normalizeConsent(value: string): string {
  const k = key(value);
  if (k === "yes") return CONSENT_CONFIRMED_V1;
  if (k === "no") return CONSENT_DECLINED_V1;
  return value;
}

const NORMALIZERS: { readonly [F in NormalizeFamilyV1]: (value: string) => string } = {
  yes_no: normalizeYesNo,
  // yes/no first, so a "Yes" never reaches the n/a matcher
  yes_no_na: (value) => normalizeNotApplicable(normalizeYesNo(value)),
  handedness: normalizeHandedness,
  consent: normalizeConsent
};

/**
 * Merges study-declared families over the defaults (study declarations win).
 */
export function mergeFieldFamiliesV1(extra: Readonly<Record<string, NormalizeFamilyV1>>): FieldFamiliesV1 {
  return Object.freeze({ ...DEFAULT_FIELD_FAMILIES_V1, ...extra });
}

/**
 * Normalizes one value under a family.
 */
export function normalizeValueV1(family: NormalizeFamilyV1, value: string): string {
  return NORMALIZERS[family](value);
}

/**
 * Returns a new frozen answer map; fields without a family are copied as-is.
 */
export function normalizeAnswersV1(
  raw: Readonly<Record<string, string>>,
  families: FieldFamiliesV1 = DEFAULT_FIELD_FAMILIES_V1
): ApplicantAnswersV1 {
  const out: Record<string, string> = {};
  for (const [field, value] of Object.entries(raw)) {
    const family = Object.prototype.hasOwnProperty.call(families, field) ? families[field] : undefined;
    out[field] = family ? normalizeValueV1(family, value) : value;
  }
  return Object.freeze(out);
}
