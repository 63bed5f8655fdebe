// Structural checks on a normalized submission. Failures are user-facing
// rejections, returned as values rather than thrown.

import type { ApplicantAnswersV1 } from "@trial-intake/contracts";
import { ageOnV1, calendarDateOfV1, parseDobV1 } from "@trial-intake/eligibility-kernel";
import type { CalendarDateV1 } from "@trial-intake/eligibility-kernel";

export const EMAIL_RE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const REJECT_EMAIL = "Invalid email address format. Please provide a valid email (e.g., example@domain.com).";
export const REJECT_PHONE = "Invalid US phone number format. Please enter a 10-digit US number (e.g. 5551234567).";
export const REJECT_DOB = "Invalid date of birth format. Please use MM/DD/YYYY.";
export const REJECT_LOCATION = "City and State information is missing.";

export type ValidatedSubmissionV1 = {
  email: string;
  phone_e164: string; // +1XXXXXXXXXX
  dob: CalendarDateV1;
  age: number;
  city_state: string;
};

export type SubmissionCheckV1 = { ok: true; value: ValidatedSubmissionV1 } | { ok: false; reason: string };

/**
 * Ten national digits of a US number, or null. Separators and a leading +1/1 are accepted.
 */
export function usNationalDigits(raw: string): string | null {
  const compact = raw.trim().replace(/[\s().-]/g, "");
  const digits = compact.startsWith("+") ? compact.slice(1) : compact;
  if (!/^\d+$/.test(digits)) return null;
  if (digits.length === 11 && digits.startsWith("1")) return digits.slice(1);
  return digits.length === 10 ? digits : null;
}

export function isUsPhoneNumber(raw: string): boolean {
  return usNationalDigits(raw) !== null;
}

export function formatUsPhoneNumber(raw: string): string | null {
  const digits = usNationalDigits(raw);
  return digits === null ? null : `+1${digits}`;
}

/**
 * Checks email, phone, date of birth and location, in that order; the first failure wins.
 */
export function validateSubmissionV1(answers: ApplicantAnswersV1, nowTs: number): SubmissionCheckV1 {
  const email = answers.email ?? "";
  if (!EMAIL_RE.test(email)) return { ok: false, reason: REJECT_EMAIL };

  const phone = formatUsPhoneNumber(answers.phone ?? "");
  if (phone === null) return { ok: false, reason: REJECT_PHONE };

  const dob = parseDobV1(answers.dob ?? "");
  if (dob === null) return { ok: false, reason: REJECT_DOB };

  const cityState = (answers.city_state ?? "").trim();
  if (!cityState) return { ok: false, reason: REJECT_LOCATION };

  return {
    ok: true,
    value: { email, phone_e164: phone, dob, age: ageOnV1(dob, calendarDateOfV1(nowTs)), city_state: cityState }
  };
}
