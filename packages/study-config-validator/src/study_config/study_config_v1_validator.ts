import pino from "pino";
import { z } from "zod";

import { WELL_KNOWN_APPLICANT_FIELDS_V1 } from "@trial-intake/contracts";
import { mergeFieldFamiliesV1, resolveLogLevelV1 } from "@trial-intake/eligibility-kernel";
import type {
  EligibilityRuleV1,
  GeoTargetV1,
  KernelLoggerV1,
  NormalizeFamilyV1
} from "@trial-intake/eligibility-kernel";

import { StudyConfigRejected } from "./study_config_rejected";
import type { SmsMessagesV1, StudyConfigIssueV1, StudyConfigV1 } from "./study_config_v1_types";
import {
  AgeRuleInputV1Z,
  ComparisonRuleInputV1Z,
  CompositeRuleInputV1Z,
  DistanceRuleInputV1Z,
  KNOWN_RULE_KINDS_V1,
  StudyConfigInputV1Z
} from "./study_config_v1_zod";
import type {
  KnownRuleInputV1,
  RuleEnvelopeV1,
  StudyConfigInputV1
} from "./study_config_v1_zod";

export const DEFAULT_SMS_MESSAGES_V1: SmsMessagesV1 = Object.freeze({
  qualified: "Thank you! Based on your answers, you may qualify for a study.",
  future_consent:
    "Thank you for your interest. Based on your answers, you do not meet the current study criteria, but since you opted for future studies, we will verify your contact information.",
  code_prompt: "Your confirmation code is {code}. Please enter this code to confirm your submission."
});

export type ValidateStudyConfigOptionsV1 = {
  logger?: KernelLoggerV1;
};

const defaultLogger: KernelLoggerV1 = pino({
  name: "study-config-validator",
  level: resolveLogLevelV1(process.env.LOG_LEVEL)
});

const KNOWN_KINDS: ReadonlySet<string> = new Set(KNOWN_RULE_KINDS_V1);

function schemaIssues(issues: ReadonlyArray<z.ZodIssue>, prefix: ReadonlyArray<string | number>): StudyConfigIssueV1[] {
  return issues.map((i) => ({
    code: "INVALID_SCHEMA",
    path: [...prefix, ...i.path].join("."),
    message: i.message
  }));
}

type ParsedRuleV1 = { ok: true; rule: KnownRuleInputV1 } | { ok: false; issues: z.ZodIssue[] };

function parseKnownRule(kind: string, raw: RuleEnvelopeV1): ParsedRuleV1 | null {
  switch (kind) {
    case "comparison": {
      const r = ComparisonRuleInputV1Z.safeParse(raw);
      return r.success ? { ok: true, rule: r.data } : { ok: false, issues: r.error.issues };
    }
    case "age": {
      const r = AgeRuleInputV1Z.safeParse(raw);
      return r.success ? { ok: true, rule: r.data } : { ok: false, issues: r.error.issues };
    }
    case "distance": {
      const r = DistanceRuleInputV1Z.safeParse(raw);
      return r.success ? { ok: true, rule: r.data } : { ok: false, issues: r.error.issues };
    }
    case "composite": {
      const r = CompositeRuleInputV1Z.safeParse(raw);
      return r.success ? { ok: true, rule: r.data } : { ok: false, issues: r.error.issues };
    }
    default:
      return null;
  }
}

/**
 * Field names a known rule reads, with the path each one was found at.
 */
function fieldRefs(rule: KnownRuleInputV1, path: string): Array<{ field: string; path: string }> {
  switch (rule.type) {
    case "comparison": {
      const refs = [{ field: rule.field, path: `${path}.field` }];
      if (rule.condition) refs.push({ field: rule.condition.controlling_field, path: `${path}.condition.controlling_field` });
      return refs;
    }
    case "composite":
      return rule.sub_rules.flatMap((sub, j) => {
        const refs = [{ field: sub.field, path: `${path}.sub_rules.${j}.field` }];
        if (sub.condition) {
          refs.push({ field: sub.condition.controlling_field, path: `${path}.sub_rules.${j}.condition.controlling_field` });
        }
        return refs;
      });
    case "age":
    case "distance":
      return [];
    default: {
      // Exhaustiveness guard.
      const _never: never = rule;
      throw new Error(`UNREACHABLE_RULE_KIND: ${String(_never)}`);
    }
  }
}

function materializeRule(rule: KnownRuleInputV1, cfg: StudyConfigInputV1): EligibilityRuleV1 {
  switch (rule.type) {
    case "comparison":
    case "composite":
      return rule;
    case "age":
      return { ...rule, minimum: rule.minimum ?? cfg.min_age };
    case "distance": {
      const target: GeoTargetV1 | undefined = cfg.geo_target;
      if (!target) throw new Error(`MISSING_GEO_TARGET: @ study:${cfg.study_id}`);
      return { ...rule, target };
    }
    default: {
      const _never: never = rule;
      throw new Error(`UNREACHABLE_RULE_KIND: ${String(_never)}`);
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * Admits a study configuration.
 *
 * 1) Structural parse of the document and of each known rule kind.
 * 2) Reference checks: unique field names and rule ids, rule and field references
 *    resolve to declared or well-known fields, distance rules have a geo target.
 * 3) Materialization into kernel rule shapes, then deep freeze.
 *
 * Unknown rule kinds are admitted as `unrecognized` and logged. Every other
 * problem is collected and thrown as one StudyConfigRejected.
 */
export function validateStudyConfigV1(input: unknown, options: ValidateStudyConfigOptionsV1 = {}): StudyConfigV1 {
  const logger = options.logger ?? defaultLogger;

  const parsed = StudyConfigInputV1Z.safeParse(input);
  if (!parsed.success) throw new StudyConfigRejected(schemaIssues(parsed.error.issues, []));
  const cfg = parsed.data;

  const issues: StudyConfigIssueV1[] = [];

  const declared = new Set<string>();
  cfg.fields.forEach((f, i) => {
    if (declared.has(f.name)) {
      issues.push({ code: "DUPLICATE_FIELD", path: `fields.${i}.name`, message: `duplicate field: ${f.name}` });
    }
    declared.add(f.name);
  });
  const knownFields = new Set<string>([...declared, ...WELL_KNOWN_APPLICANT_FIELDS_V1]);

  const requireField = (field: string, path: string): void => {
    if (!knownFields.has(field)) {
      issues.push({ code: "UNKNOWN_FIELD_REF", path, message: `unknown field: ${field}` });
    }
  };

  cfg.fields.forEach((f, i) => {
    if (f.conditional_on) requireField(f.conditional_on.field, `fields.${i}.conditional_on.field`);
  });

  const ruleIds = new Set<string>();
  const admitted: Array<KnownRuleInputV1 | { type: "unrecognized"; rule_id?: string; declared_type: string }> = [];

  cfg.rules.forEach((raw, i) => {
    if (raw.rule_id !== undefined) {
      if (ruleIds.has(raw.rule_id)) {
        issues.push({ code: "DUPLICATE_RULE_ID", path: `rules.${i}.rule_id`, message: `duplicate rule_id: ${raw.rule_id}` });
      }
      ruleIds.add(raw.rule_id);
    }

    if (!KNOWN_KINDS.has(raw.type)) {
      logger.warn(
        { study_id: cfg.study_id, rule_index: i, declared_type: raw.type },
        "UNRECOGNIZED_RULE_KIND: admitted, will be skipped at evaluation"
      );
      admitted.push({ type: "unrecognized", rule_id: raw.rule_id, declared_type: raw.type });
      return;
    }

    const r = parseKnownRule(raw.type, raw);
    if (!r) return;
    if (!r.ok) {
      issues.push(...schemaIssues(r.issues, ["rules", i]));
      return;
    }

    for (const ref of fieldRefs(r.rule, `rules.${i}`)) requireField(ref.field, ref.path);
    if (r.rule.type === "distance" && !cfg.geo_target) {
      issues.push({
        code: "MISSING_GEO_TARGET",
        path: `rules.${i}`,
        message: "distance rules need the study's geo_target"
      });
    }
    admitted.push(r.rule);
  });

  if (issues.length > 0) throw new StudyConfigRejected(issues);

  const rules: EligibilityRuleV1[] = admitted.map((r) => (r.type === "unrecognized" ? r : materializeRule(r, cfg)));

  const families: Record<string, NormalizeFamilyV1> = {};
  for (const f of cfg.fields) {
    if (f.normalize) families[f.name] = f.normalize;
  }

  return deepFreeze({
    type: cfg.type,
    schema_version: cfg.schema_version,
    study_id: cfg.study_id,
    form_title: cfg.form_title,
    study_summary: cfg.study_summary,
    fields: cfg.fields,
    rules,
    min_age: cfg.min_age,
    geo_target: cfg.geo_target,
    allowed_tags: cfg.allowed_tags,
    routing: cfg.routing,
    sms_messages: {
      qualified: cfg.sms_messages.qualified ?? DEFAULT_SMS_MESSAGES_V1.qualified,
      future_consent: cfg.sms_messages.future_consent ?? DEFAULT_SMS_MESSAGES_V1.future_consent,
      code_prompt: cfg.sms_messages.code_prompt ?? DEFAULT_SMS_MESSAGES_V1.code_prompt
    },
    field_families: mergeFieldFamiliesV1(families)
  });
}

export function isStudyConfigV1(input: unknown): boolean {
  try {
    validateStudyConfigV1(input, { logger: { warn: () => undefined } });
    return true;
  } catch {
    return false;
  }
}
