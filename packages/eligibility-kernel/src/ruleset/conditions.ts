// Eligibility Kernel - Conditional applicability (v1)

import type { ApplicantAnswersV1 } from "@trial-intake/contracts";

import type { RuleConditionV1 } from "./types";

/**
 * True when the condition makes the rule vacuously satisfied.
 *
 * A missing or empty controlling value counts as a mismatch.
 */
export function isVacuouslySatisfiedV1(
  condition: RuleConditionV1 | undefined,
  ownField: string | undefined,
  answers: ApplicantAnswersV1
): boolean {
  if (!condition) return false;

  const controlling = answers[condition.controlling_field];
  if (controlling === undefined || controlling === "" || controlling !== condition.required_value) {
    return true;
  }

  if (condition.skip_value !== undefined && ownField !== undefined && answers[ownField] === condition.skip_value) {
    return true;
  }

  return false;
}
