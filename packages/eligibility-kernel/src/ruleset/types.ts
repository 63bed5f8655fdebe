// Eligibility Kernel - Admitted rule types (v1)
//
// These are the shapes the evaluator consumes. They are produced by study-config
// admission (which materializes defaults such as the age minimum and distance target),
// never parsed here.

import type { ApplicantAnswersV1, EligibilityVerdictV1 } from "@trial-intake/contracts";

import type { GeoPointV1 } from "../geo/haversine";

export type ComparisonOperatorV1 = "equals" | "not_equals" | "in_list";

/**
 * Applicability guard: the rule only applies when `controlling_field` equals
 * `required_value`, and never when the rule's own field equals `skip_value`.
 */
export type RuleConditionV1 = {
  controlling_field: string;
  required_value: string;
  skip_value?: string;
};

export type ComparisonRuleV1 = {
  type: "comparison";
  rule_id?: string;
  field: string;
  operator: ComparisonOperatorV1;
  value: string | ReadonlyArray<string>;
  disqual_message: string;
  condition?: RuleConditionV1;
};

// Sub-rules of a composite may leave their message to the composite.
export type CompositeSubRuleV1 = Omit<ComparisonRuleV1, "disqual_message"> & {
  disqual_message?: string;
};

export type AgeRuleV1 = {
  type: "age";
  rule_id?: string;
  minimum: number;
  disqual_message: string;
};

export type GeoTargetV1 = GeoPointV1 & {
  radius_miles: number;
};

export type DistanceRuleV1 = {
  type: "distance";
  rule_id?: string;
  target: GeoTargetV1;
  disqual_message: string;
};

export type CompositeRuleV1 = {
  type: "composite";
  rule_id?: string;
  sub_rules: ReadonlyArray<CompositeSubRuleV1>;
  disqual_message: string;
};

// A rule whose declared type this kernel does not know. Admitted, then skipped.
export type UnrecognizedRuleV1 = {
  type: "unrecognized";
  rule_id?: string;
  declared_type: string;
};

/**
 * Kind -> rule shape. Adding a kind means adding an entry here and a strategy.
 */
export type RuleByKindV1 = {
  comparison: ComparisonRuleV1;
  age: AgeRuleV1;
  distance: DistanceRuleV1;
  composite: CompositeRuleV1;
};

export type RuleKindV1 = keyof RuleByKindV1;
export type KnownRuleV1 = RuleByKindV1[RuleKindV1];
export type EligibilityRuleV1 = KnownRuleV1 | UnrecognizedRuleV1;

/**
 * Facts derived upstream of the evaluator. Null means "could not be determined".
 */
export type DerivedFactsV1 = {
  age?: number | null;
  coords?: GeoPointV1 | null;
};

export type RuleContextV1 = {
  answers: ApplicantAnswersV1;
  facts: DerivedFactsV1;
};

/**
 * One rule's result. `messages` replaces the rule's own disqual_message when present.
 */
export type RuleOutcomeV1 = {
  satisfied: boolean;
  messages?: ReadonlyArray<string>;
  tags?: ReadonlyArray<string>;
};

export type RuleStrategyV1<K extends RuleKindV1> = (rule: RuleByKindV1[K], ctx: RuleContextV1) => RuleOutcomeV1;

export type RuleStrategyMapV1 = { readonly [K in RuleKindV1]: RuleStrategyV1<K> };

export type { EligibilityVerdictV1 };
