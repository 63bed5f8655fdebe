import type { StudyConfigIssueV1 } from "./study_config_v1_types";

export class StudyConfigRejected extends Error {
  public readonly errors: ReadonlyArray<StudyConfigIssueV1>;

  constructor(errors: ReadonlyArray<StudyConfigIssueV1>) {
    super(`STUDY_CONFIG_REJECTED: ${errors.map((e) => `${e.code}@${e.path}`).join(",")}`);
    this.name = "StudyConfigRejected";
    this.errors = errors;
  }
}
