// Eligibility Kernel - Rule evaluator (v1)
//
// Interprets an admitted rule list against normalized answers and derived facts.
// - rules run in declaration order, with no state carried between them
// - conditional rules whose guard does not hold are vacuously satisfied
// - dispatch goes through the strategy map; unrecognized kinds are skipped with a warning
// - reasons and tags are de-duplicated, first occurrence wins

import type { ApplicantAnswersV1, EligibilityVerdictV1 } from "@trial-intake/contracts";

import { kernelLogger } from "../log";
import type { KernelLoggerV1 } from "../log";
import { LEFT_HANDED } from "../normalize/field_normalizer";
import { TAG_LEFT_HANDED } from "../tags";
import { isVacuouslySatisfiedV1 } from "./conditions";
import { RULE_STRATEGIES_V1 } from "./strategies";
import type {
  DerivedFactsV1,
  EligibilityRuleV1,
  RuleByKindV1,
  RuleContextV1,
  RuleKindV1,
  RuleOutcomeV1,
  RuleStrategyMapV1
} from "./types";

export type EvaluateOptionsV1 = {
  logger?: KernelLoggerV1;
};

function applyStrategy<K extends RuleKindV1>(
  strategies: RuleStrategyMapV1,
  kind: K,
  rule: RuleByKindV1[K],
  ctx: RuleContextV1
): RuleOutcomeV1 {
  const strategy = strategies[kind];
  return strategy(rule, ctx);
}

/**
 * Ordered set with insertion-order iteration.
 */
function pushUnique(out: string[], seen: Set<string>, values: ReadonlyArray<string>): void {
  for (const v of values) {
    if (seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
}

/**
 * Evaluates rules and returns a frozen verdict.
 */
export function evaluateRulesV1(
  rules: ReadonlyArray<EligibilityRuleV1>,
  answers: ApplicantAnswersV1,
  facts: DerivedFactsV1,
  options: EvaluateOptionsV1 = {}
): EligibilityVerdictV1 {
  const logger = options.logger ?? kernelLogger;
  const ctx: RuleContextV1 = { answers, facts };

  let qualified = true;
  const reasons: string[] = [];
  const reasonSet = new Set<string>();
  const tags: string[] = [];
  const tagSet = new Set<string>();

  rules.forEach((rule, index) => {
    if (rule.type === "unrecognized") {
      logger.warn(
        { rule_index: index, rule_id: rule.rule_id, declared_type: rule.declared_type },
        "UNRECOGNIZED_RULE_KIND: skipped"
      );
      return;
    }

    const condition = "condition" in rule ? rule.condition : undefined;
    const ownField = "field" in rule ? rule.field : undefined;
    if (isVacuouslySatisfiedV1(condition, ownField, answers)) return;

    const outcome = applyStrategy(RULE_STRATEGIES_V1, rule.type, rule, ctx);
    if (outcome.tags) pushUnique(tags, tagSet, outcome.tags);
    if (outcome.satisfied) return;

    qualified = false;
    pushUnique(reasons, reasonSet, outcome.messages ?? [rule.disqual_message]);
  });

  // Classification only; never affects `qualified`.
  if (answers.handedness === LEFT_HANDED) pushUnique(tags, tagSet, [TAG_LEFT_HANDED]);

  return Object.freeze({
    qualified,
    reasons: Object.freeze(reasons),
    tags: Object.freeze(tags)
  });
}
