// File-backed study registry.
//
// One JSON document per study: <studies_dir>/<study_id>.json, admitted by the
// study-config validator. Admitted configs are cached; misses and rejections are
// logged and re-tried on the next lookup.

import fs from "node:fs";
import path from "node:path";

import { StudyConfigRejected, validateStudyConfigV1 } from "@trial-intake/study-config-validator";
import type { StudyConfigIssueV1, StudyConfigV1 } from "@trial-intake/study-config-validator";

import type { Logger } from "../log";
import { errorMessage, sha256Hex } from "../util";

export type StudyLoadStatusV1 = "APPLIED" | "MISSING" | "INVALID";

export type StudyLoadResultV1 =
  | { status: "APPLIED"; config_ref: string; config: StudyConfigV1 }
  | { status: "MISSING"; config_ref: "MISSING" }
  | { status: "INVALID"; config_ref: string; error_code: string; errors: ReadonlyArray<StudyConfigIssueV1> };

export interface StudyRegistry {
  get(studyId: string): StudyConfigV1 | undefined;
}

const STUDY_ID_RE = /^[a-z0-9_]+$/;

function configRefFromBytes(bytes: Buffer): string {
  return `sha256:${sha256Hex(bytes)}`; // stable, offline recomputable
}

/**
 * Loads and admits one study file. Never throws for missing or malformed files.
 */
export function loadStudyConfigFromFile(filePath: string, logger: Logger): StudyLoadResultV1 {
  if (!fs.existsSync(filePath)) {
    return { status: "MISSING", config_ref: "MISSING" };
  }

  const bytes = fs.readFileSync(filePath);
  const config_ref = configRefFromBytes(bytes);

  let json: unknown;
  try {
    json = JSON.parse(bytes.toString("utf8"));
  } catch (e) {
    return {
      status: "INVALID",
      config_ref,
      error_code: "STUDY_CONFIG_JSON_INVALID",
      errors: [{ code: "INVALID_SCHEMA", path: "", message: errorMessage(e) }]
    };
  }

  try {
    return { status: "APPLIED", config_ref, config: validateStudyConfigV1(json, { logger }) };
  } catch (e) {
    if (e instanceof StudyConfigRejected) {
      return { status: "INVALID", config_ref, error_code: "STUDY_CONFIG_REJECTED", errors: e.errors };
    }
    throw e;
  }
}

export class FileStudyRegistry implements StudyRegistry {
  private readonly cache = new Map<string, StudyConfigV1>();

  constructor(
    private readonly dir: string,
    private readonly logger: Logger
  ) {}

  get(studyId: string): StudyConfigV1 | undefined {
    const cached = this.cache.get(studyId);
    if (cached) return cached;

    // Ids become file names; anything else is unknown by construction.
    if (!STUDY_ID_RE.test(studyId)) {
      this.logger.warn({ study_id: studyId }, "study id rejected");
      return undefined;
    }

    const loaded = loadStudyConfigFromFile(path.join(this.dir, `${studyId}.json`), this.logger);
    switch (loaded.status) {
      case "APPLIED":
        if (loaded.config.study_id !== studyId) {
          this.logger.error(
            { study_id: studyId, declared_study_id: loaded.config.study_id, config_ref: loaded.config_ref },
            "STUDY_ID_MISMATCH: file name and study_id differ"
          );
          return undefined;
        }
        this.logger.info({ study_id: studyId, config_ref: loaded.config_ref }, "study config applied");
        this.cache.set(studyId, loaded.config);
        return loaded.config;
      case "MISSING":
        this.logger.warn({ study_id: studyId, dir: this.dir }, "study config missing");
        return undefined;
      case "INVALID":
        this.logger.error(
          { study_id: studyId, config_ref: loaded.config_ref, error_code: loaded.error_code, errors: loaded.errors },
          "study config invalid"
        );
        return undefined;
      default: {
        const _never: never = loaded;
        throw new Error(`UNREACHABLE_LOAD_STATUS: ${String(_never)}`);
      }
    }
  }

  /**
   * Study ids with a config file present (admitted or not).
   */
  listStudyIds(): string[] {
    if (!fs.existsSync(this.dir)) return [];
    return fs
      .readdirSync(this.dir)
      .filter((n) => n.endsWith(".json"))
      .map((n) => n.slice(0, -".json".length))
      .filter((id) => STUDY_ID_RE.test(id))
      .sort();
  }
}

/**
 * Registry over already-admitted configs.
 */
export class StaticStudyRegistry implements StudyRegistry {
  private readonly byId: ReadonlyMap<string, StudyConfigV1>;

  constructor(configs: ReadonlyArray<StudyConfigV1>) {
    this.byId = new Map(configs.map((c) => [c.study_id, c]));
  }

  get(studyId: string): StudyConfigV1 | undefined {
    return this.byId.get(studyId);
  }
}
