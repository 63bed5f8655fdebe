// Eligibility Kernel - Rule strategies (v1)
//
// One strategy per rule kind. Strategies are pure: they read the answers and derived
// facts, and report satisfaction plus any messages/tags of their own.

import { isWithinRadiusV1 } from "../geo/haversine";
import { TAG_LOCATION_UNKNOWN, TAG_TOO_FAR } from "../tags";
import { compareV1 } from "./comparators";
import { isVacuouslySatisfiedV1 } from "./conditions";
import type {
  AgeRuleV1,
  ComparisonRuleV1,
  CompositeRuleV1,
  CompositeSubRuleV1,
  DistanceRuleV1,
  RuleContextV1,
  RuleOutcomeV1,
  RuleStrategyMapV1
} from "./types";

function compareField(rule: ComparisonRuleV1 | CompositeSubRuleV1, ctx: RuleContextV1): boolean {
  return compareV1(rule.operator, ctx.answers[rule.field], rule.value);
}

function evaluateComparison(rule: ComparisonRuleV1, ctx: RuleContextV1): RuleOutcomeV1 {
  return { satisfied: compareField(rule, ctx) };
}

function evaluateAge(rule: AgeRuleV1, ctx: RuleContextV1): RuleOutcomeV1 {
  const age = ctx.facts.age;
  return { satisfied: typeof age === "number" && age >= rule.minimum };
}

function evaluateDistance(rule: DistanceRuleV1, ctx: RuleContextV1): RuleOutcomeV1 {
  const coords = ctx.facts.coords;

  // Unverifiable location disqualifies.
  if (!coords) {
    return { satisfied: false, messages: [rule.disqual_message], tags: [TAG_LOCATION_UNKNOWN] };
  }

  if (isWithinRadiusV1(coords, rule.target, rule.target.radius_miles)) {
    return { satisfied: true };
  }
  return { satisfied: false, messages: [rule.disqual_message], tags: [TAG_TOO_FAR] };
}

function evaluateComposite(rule: CompositeRuleV1, ctx: RuleContextV1): RuleOutcomeV1 {
  let satisfied = true;
  const messages: string[] = [];

  for (const sub of rule.sub_rules) {
    // Same applicability guard as a top-level rule, scoped to the sub-rule.
    if (isVacuouslySatisfiedV1(sub.condition, sub.field, ctx.answers)) continue;
    if (compareField(sub, ctx)) continue;

    satisfied = false;
    if (sub.disqual_message !== undefined) messages.push(sub.disqual_message);
  }

  if (satisfied) return { satisfied };
  return { satisfied, messages: messages.length > 0 ? messages : [rule.disqual_message] };
}

/**
 * Default strategy map. Keyed by rule kind; the evaluator never switches on kind itself.
 */
export const RULE_STRATEGIES_V1: RuleStrategyMapV1 = Object.freeze({
  comparison: evaluateComparison,
  age: evaluateAge,
  distance: evaluateDistance,
  composite: evaluateComposite
});
