import { z } from "zod"; // structural admission: close the shape before any reference check

import { NORMALIZE_FAMILIES_V1 } from "@trial-intake/eligibility-kernel";

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // SemVer, no free-text versions
const NonEmptyZ = z.string().min(1);

export const CODE_PLACEHOLDER = "{code}";

export const FieldSpecV1Z = z
  .object({
    name: z.string().regex(/^[a-z][a-z0-9_]*$/), // answer key
    label: NonEmptyZ,
    input: z.enum(["text", "email", "tel", "radio"]),
    options: z.array(NonEmptyZ).min(1).optional(), // radio choices
    required: z.boolean().default(false),
    placeholder: z.string().optional(),
    description: z.string().optional(),
    validation: z.enum(["email", "phone", "dob_age"]).optional(), // rendering hint only
    normalize: z.enum(NORMALIZE_FAMILIES_V1).optional(), // extends the default field families
    conditional_on: z.object({ field: NonEmptyZ, value: z.string() }).strict().optional() // shown only when another answer matches
  })
  .strict()
  .superRefine((f, ctx) => {
    if (f.input === "radio" && !f.options) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "radio fields must declare options", path: ["options"] });
    }
  });

export type FieldSpecV1 = z.output<typeof FieldSpecV1Z>;

const RuleConditionV1Z = z
  .object({
    controlling_field: NonEmptyZ,
    required_value: z.string(),
    skip_value: z.string().optional()
  })
  .strict();

function checkOperatorValue(
  r: { operator: "equals" | "not_equals" | "in_list"; value: string | string[] },
  ctx: z.RefinementCtx
): void {
  const isList = Array.isArray(r.value);
  if (r.operator === "in_list" && !isList) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "in_list takes an array value", path: ["value"] });
  }
  if (r.operator !== "in_list" && isList) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${r.operator} takes a string value`, path: ["value"] });
  }
}

const comparisonShape = {
  type: z.literal("comparison"),
  rule_id: NonEmptyZ.optional(), // audit only
  field: NonEmptyZ,
  operator: z.enum(["equals", "not_equals", "in_list"]),
  value: z.union([z.string(), z.array(z.string()).min(1)]),
  condition: RuleConditionV1Z.optional()
};

export const ComparisonRuleInputV1Z = z
  .object({ ...comparisonShape, disqual_message: NonEmptyZ })
  .strict()
  .superRefine(checkOperatorValue);

// Composite sub-rules may defer their message to the composite.
export const CompositeSubRuleInputV1Z = z
  .object({ ...comparisonShape, disqual_message: NonEmptyZ.optional() })
  .strict()
  .superRefine(checkOperatorValue);

export const AgeRuleInputV1Z = z
  .object({
    type: z.literal("age"),
    rule_id: NonEmptyZ.optional(),
    minimum: z.number().int().nonnegative().optional(), // defaults to the study's min_age
    disqual_message: NonEmptyZ
  })
  .strict();

// Target and radius come from the study's geo_target.
export const DistanceRuleInputV1Z = z
  .object({
    type: z.literal("distance"),
    rule_id: NonEmptyZ.optional(),
    disqual_message: NonEmptyZ
  })
  .strict();

export const CompositeRuleInputV1Z = z
  .object({
    type: z.literal("composite"),
    rule_id: NonEmptyZ.optional(),
    sub_rules: z.array(CompositeSubRuleInputV1Z).min(1),
    disqual_message: NonEmptyZ
  })
  .strict();

export const KNOWN_RULE_KINDS_V1 = ["comparison", "age", "distance", "composite"] as const;

export type ComparisonRuleInputV1 = z.output<typeof ComparisonRuleInputV1Z>;
export type CompositeSubRuleInputV1 = z.output<typeof CompositeSubRuleInputV1Z>;
export type KnownRuleInputV1 =
  | ComparisonRuleInputV1
  | z.output<typeof AgeRuleInputV1Z>
  | z.output<typeof DistanceRuleInputV1Z>
  | z.output<typeof CompositeRuleInputV1Z>;

// First pass only pins the discriminator; each kind is parsed on its own so that
// unknown kinds can be admitted and known kinds report their own issues.
export const RuleEnvelopeV1Z = z
  .object({
    type: NonEmptyZ,
    rule_id: z.string().optional()
  })
  .passthrough();

export type RuleEnvelopeV1 = z.output<typeof RuleEnvelopeV1Z>;

export const GeoTargetV1Z = z
  .object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    radius_miles: z.number().positive()
  })
  .strict();

export const RoutingV1Z = z
  .object({
    board_id: NonEmptyZ, // opaque board handle
    qualified: NonEmptyZ, // bucket labels, never interpreted
    disqualified: NonEmptyZ,
    duplicate: NonEmptyZ,
    column_mappings: z.record(NonEmptyZ).default({})
  })
  .strict();

export type RoutingV1 = z.output<typeof RoutingV1Z>;

export const SmsMessagesInputV1Z = z
  .object({
    qualified: NonEmptyZ.optional(), // shown after submit when qualified
    future_consent: NonEmptyZ.optional(), // shown after submit when contactable
    code_prompt: NonEmptyZ.refine((s) => s.includes(CODE_PLACEHOLDER), {
      message: `code_prompt must contain ${CODE_PLACEHOLDER}`
    }).optional() // SMS body
  })
  .strict();

export const StudyConfigInputV1Z = z
  .object({
    type: z.literal("study_config_v1"),
    schema_version: SemVerZ,
    study_id: z.string().regex(/^[a-z0-9_]+$/),
    form_title: NonEmptyZ,
    study_summary: z.string().optional(),
    fields: z.array(FieldSpecV1Z).min(1),
    rules: z.array(RuleEnvelopeV1Z),
    min_age: z.number().int().nonnegative(),
    geo_target: GeoTargetV1Z.optional(),
    allowed_tags: z.array(NonEmptyZ),
    routing: RoutingV1Z,
    sms_messages: SmsMessagesInputV1Z.default({})
  })
  .strict();

export type StudyConfigInputV1 = z.output<typeof StudyConfigInputV1Z>;
