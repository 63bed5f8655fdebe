import fs from "node:fs";
import path from "node:path";

// apps/intake, where the app-local .env lives.
export const INTAKE_APP_DIR = path.resolve(__dirname, "..");

export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (env[key] == null) env[key] = val;
  }
}

/**
 * Loads the app-local .env first, then the repo root .env; neither overrides
 * variables that are already set, so the app-local file wins over the root one.
 */
export function loadEnv(repoRoot: string, appDir: string, env: NodeJS.ProcessEnv = process.env): void {
  loadDotEnvFile(path.join(appDir, ".env"), env);
  loadDotEnvFile(path.join(repoRoot, ".env"), env);
}
