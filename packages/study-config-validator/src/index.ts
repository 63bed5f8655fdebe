export { validateStudyConfigV1, isStudyConfigV1, DEFAULT_SMS_MESSAGES_V1 } from "./study_config/study_config_v1_validator";
export type { ValidateStudyConfigOptionsV1 } from "./study_config/study_config_v1_validator";
export { StudyConfigRejected } from "./study_config/study_config_rejected";
export { CODE_PLACEHOLDER, KNOWN_RULE_KINDS_V1, StudyConfigInputV1Z } from "./study_config/study_config_v1_zod";
export type { FieldSpecV1, RoutingV1, StudyConfigInputV1 } from "./study_config/study_config_v1_zod";
export type * from "./study_config/study_config_v1_types";
