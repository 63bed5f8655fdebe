// Intake service configuration.
//
// Source of truth: process env (after .env loading). Study configs themselves are
// data files under STUDIES_DIR, admitted by the study registry.

import path from "node:path";

import { z } from "zod";

const IntStrZ = (def: number) =>
  z
    .string()
    .regex(/^\d+$/)
    .default(String(def))
    .transform((s) => Number(s));

export const IntakeServiceEnvZ = z.object({
  PORT: IntStrZ(3210),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  STUDIES_DIR: z.string().min(1).optional(),
  SESSION_TTL_MS: IntStrZ(15 * 60 * 1000),
  SESSION_SWEEP_MS: IntStrZ(60 * 1000)
});

export type IntakeServiceConfigV1 = {
  port: number;
  host: string;
  log_level: z.output<typeof IntakeServiceEnvZ>["LOG_LEVEL"];
  studies_dir: string;
  session_ttl_ms: number;
  session_sweep_ms: number;
};

export class IntakeConfigRejected extends Error {
  public readonly errors: ReadonlyArray<{ path: string; message: string }>;

  constructor(errors: ReadonlyArray<{ path: string; message: string }>) {
    super(`INTAKE_CONFIG_REJECTED: ${errors.map((e) => `${e.path}:${e.message}`).join(",")}`);
    this.name = "IntakeConfigRejected";
    this.errors = errors;
  }
}

/**
 * Reads service settings from env. Relative paths resolve against `repoRoot`.
 */
export function loadIntakeServiceConfig(env: NodeJS.ProcessEnv, repoRoot: string): IntakeServiceConfigV1 {
  const parsed = IntakeServiceEnvZ.safeParse(env);
  if (!parsed.success) {
    throw new IntakeConfigRejected(
      parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
    );
  }
  const e = parsed.data;

  if (e.SESSION_TTL_MS <= 0) {
    throw new IntakeConfigRejected([{ path: "SESSION_TTL_MS", message: "must be > 0" }]);
  }

  const resolve = (p: string): string => (path.isAbsolute(p) ? p : path.resolve(repoRoot, p));

  return {
    port: e.PORT,
    host: e.HOST,
    log_level: e.LOG_LEVEL,
    studies_dir: resolve(e.STUDIES_DIR ?? path.join("config", "studies")),
    session_ttl_ms: e.SESSION_TTL_MS,
    session_sweep_ms: e.SESSION_SWEEP_MS
  };
}
