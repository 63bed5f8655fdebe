// User-facing texts of the intake flow.

export const DUPLICATE_MESSAGE =
  "It looks like you've already submitted an application for this platform. We'll be in touch if you qualify!";
export const INTERNAL_ERROR_MESSAGE = "An unexpected error occurred during qualification. Please try again.";
export const CODE_MISMATCH_MESSAGE = "That code doesn't match. Please try again.";
export const SESSION_NOT_FOUND_MESSAGE = "Verification session expired or not found. Please resubmit the form.";
export const CONTACTABLE_CONFIRMED_MESSAGE =
  "Your submission is confirmed! Based on your answers, you do not meet the current study criteria, but your information has been saved for future studies you may qualify for.";

export function studyNotFoundMessage(studyId: string): string {
  return `Study configuration for '${studyId}' not found.`;
}

export function smsFailedMessage(error: string): string {
  return `Failed to send SMS for verification: ${error}. Please check your phone number and try again.`;
}

/**
 * "X", "X and Y", "X, Y, and Z".
 */
export function joinReasons(reasons: ReadonlyArray<string>): string {
  if (reasons.length <= 1) return reasons.join("");
  if (reasons.length === 2) return `${reasons[0]} and ${reasons[1]}`;
  return `${reasons.slice(0, -1).join(", ")}, and ${reasons[reasons.length - 1]}`;
}

export function disqualifiedFinalMessage(reasons: ReadonlyArray<string>): string {
  if (reasons.length === 0) {
    return "Thank you for your interest. Unfortunately, based on your answers, you do not meet the current study criteria. We appreciate your time.";
  }
  return `Thank you for your interest. Unfortunately, based on your answers, you do not meet the current study criteria because ${joinReasons(reasons)}. We appreciate your time.`;
}

export function qualifiedConfirmedMessage(formTitle: string): string {
  return `Your submission is confirmed! Based on your answers, you may qualify for the ${formTitle}. We will contact you soon with more details.`;
}

/**
 * Fills every {code} placeholder.
 */
export function renderCodePrompt(template: string, code: string): string {
  return template.split("{code}").join(code);
}
