// Eligibility Kernel - Pure evaluation entrypoint (v1)
//
// This module exports the functions the intake service calls per submission:
// 1) Normalizes raw answers into the rule vocabulary.
// 2) Evaluates a study's admitted rules against them.
//
// No IO. No clock. No config loading.

import type { ApplicantAnswersV1, EligibilityVerdictV1 } from "@trial-intake/contracts";

import { DEFAULT_FIELD_FAMILIES_V1, normalizeAnswersV1 } from "./normalize/field_normalizer";
import type { FieldFamiliesV1 } from "./normalize/field_normalizer";
import { evaluateRulesV1 } from "./ruleset/evaluator";
import type { EvaluateOptionsV1 } from "./ruleset/evaluator";
import type { DerivedFactsV1, EligibilityRuleV1 } from "./ruleset/types";

/**
 * Evaluates eligibility deterministically.
 *
 * @param rules - Admitted rules, in declaration order.
 * @param answers - Normalized answers.
 * @param facts - Age and coordinates derived upstream; null when unavailable.
 */
export function evaluateEligibilityV1(
  rules: ReadonlyArray<EligibilityRuleV1>,
  answers: ApplicantAnswersV1,
  facts: DerivedFactsV1,
  options?: EvaluateOptionsV1
): EligibilityVerdictV1 {
  return evaluateRulesV1(rules, answers, facts, options);
}

/**
 * Normalizes then evaluates, for callers that hold raw answers.
 */
export function screenApplicantV1(
  rules: ReadonlyArray<EligibilityRuleV1>,
  rawAnswers: Readonly<Record<string, string>>,
  facts: DerivedFactsV1,
  families: FieldFamiliesV1 = DEFAULT_FIELD_FAMILIES_V1,
  options?: EvaluateOptionsV1
): { answers: ApplicantAnswersV1; verdict: EligibilityVerdictV1 } {
  const answers = normalizeAnswersV1(rawAnswers, families);
  return { answers, verdict: evaluateRulesV1(rules, answers, facts, options) };
}
