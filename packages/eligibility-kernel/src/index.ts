export { evaluateEligibilityV1, screenApplicantV1 } from "./kernel";

export { EARTH_RADIUS_MILES, haversineMilesV1, isWithinRadiusV1 } from "./geo/haversine";
export type { GeoPointV1 } from "./geo/haversine";

export {
  DEFAULT_FIELD_FAMILIES_V1,
  LEFT_HANDED,
  NORMALIZE_FAMILIES_V1,
  NOT_APPLICABLE,
  RIGHT_HANDED,
  mergeFieldFamiliesV1,
  normalizeAnswersV1,
  normalizeValueV1
} from "./normalize/field_normalizer";
export type { FieldFamiliesV1, NormalizeFamilyV1 } from "./normalize/field_normalizer";

export { ageOnV1, calendarDateOfV1, parseDobV1 } from "./age/age";
export type { CalendarDateV1 } from "./age/age";

export { COMPARATORS_V1 } from "./ruleset/comparators";
export { RULE_STRATEGIES_V1 } from "./ruleset/strategies";
export { evaluateRulesV1 } from "./ruleset/evaluator";
export type { EvaluateOptionsV1 } from "./ruleset/evaluator";
export type * from "./ruleset/types";

export { TAG_DUPLICATE, TAG_LEFT_HANDED, TAG_LOCATION_UNKNOWN, TAG_TOO_FAR } from "./tags";
export { resolveLogLevelV1 } from "./log";
export type { KernelLoggerV1 } from "./log";
