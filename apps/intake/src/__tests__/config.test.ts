import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { after, describe, it } from "node:test";

import { IntakeConfigRejected, loadIntakeServiceConfig } from "../config";
import { INTAKE_APP_DIR, loadDotEnvFile, loadEnv } from "../env";
import { findRepoRoot } from "../util";

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "intake-config-"));
const repoRoot = path.join(tmpDir, "repo");

after(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("loadIntakeServiceConfig", () => {
  it("applies defaults relative to the repo root", () => {
    assert.deepEqual(loadIntakeServiceConfig({}, repoRoot), {
      port: 3210,
      host: "0.0.0.0",
      log_level: "info",
      studies_dir: path.join(repoRoot, "config", "studies"),
      session_ttl_ms: 900000,
      session_sweep_ms: 60000
    });
  });

  it("reads overrides from env", () => {
    const cfg = loadIntakeServiceConfig(
      {
        PORT: "8080",
        LOG_LEVEL: "warn",
        STUDIES_DIR: "/srv/studies",
        SESSION_TTL_MS: "60000"
      },
      repoRoot
    );
    assert.equal(cfg.port, 8080);
    assert.equal(cfg.log_level, "warn");
    assert.equal(cfg.studies_dir, "/srv/studies");
    assert.equal(cfg.session_ttl_ms, 60000);
  });

  it("rejects malformed values with their paths", () => {
    assert.throws(
      () => loadIntakeServiceConfig({ PORT: "eighty", LOG_LEVEL: "verbose" }, repoRoot),
      (e: unknown) => {
        assert.ok(e instanceof IntakeConfigRejected);
        assert.deepEqual(
          e.errors.map((x) => x.path),
          ["PORT", "LOG_LEVEL"]
        );
        return true;
      }
    );
  });

  it("rejects a zero session TTL", () => {
    assert.throws(() => loadIntakeServiceConfig({ SESSION_TTL_MS: "0" }, repoRoot), /INTAKE_CONFIG_REJECTED: SESSION_TTL_MS:must be > 0/);
  });
});

describe(".env loading", () => {
  it("parses assignments, skips comments and strips quotes", () => {
    const fp = path.join(tmpDir, "plain.env");
    fs.writeFileSync(fp, ["# comment", "", "PORT=4000", 'HOST="127.0.0.1"', "LOG_LEVEL='debug'", "not an assignment"].join("\n"));
    const env: NodeJS.ProcessEnv = {};
    loadDotEnvFile(fp, env);
    assert.deepEqual(env, { PORT: "4000", HOST: "127.0.0.1", LOG_LEVEL: "debug" });
  });

  it("never overrides variables that are already set", () => {
    const appDir = path.join(tmpDir, "app");
    const root = path.join(tmpDir, "root");
    fs.mkdirSync(appDir, { recursive: true });
    fs.mkdirSync(root, { recursive: true });
    fs.writeFileSync(path.join(appDir, ".env"), "PORT=4001\nHOST=app-host\n");
    fs.writeFileSync(path.join(root, ".env"), "PORT=4002\nLOG_LEVEL=error\nSTUDIES_DIR=/srv/root-studies\n");

    const env: NodeJS.ProcessEnv = { STUDIES_DIR: "/srv/studies" };
    loadEnv(root, appDir, env);
    assert.deepEqual(env, { STUDIES_DIR: "/srv/studies", PORT: "4001", HOST: "app-host", LOG_LEVEL: "error" });
  });

  it("looks for the app-local file in the app directory", () => {
    assert.equal(INTAKE_APP_DIR, path.resolve(__dirname, "../.."));
    assert.ok(fs.existsSync(path.join(INTAKE_APP_DIR, "package.json")));
  });

  it("ignores a missing file", () => {
    const env: NodeJS.ProcessEnv = {};
    loadDotEnvFile(path.join(tmpDir, "absent.env"), env);
    assert.deepEqual(env, {});
  });
});

describe("findRepoRoot", () => {
  it("walks up to the directory holding the probe path", () => {
    const deep = path.join(tmpDir, "walk", "a", "b");
    fs.mkdirSync(deep, { recursive: true });
    fs.mkdirSync(path.join(tmpDir, "walk", "config", "studies"), { recursive: true });
    assert.equal(findRepoRoot(deep, "config/studies"), path.join(tmpDir, "walk"));
  });

  it("finds this repository from the test directory", () => {
    assert.equal(findRepoRoot(__dirname, "config/studies"), path.resolve(__dirname, "../../../.."));
  });

  it("gives up after the hop limit", () => {
    const deep = path.join(tmpDir, "hops", "a", "b", "c");
    fs.mkdirSync(deep, { recursive: true });
    assert.throws(() => findRepoRoot(deep, "no-such-probe-path", 1), /Cannot locate repo root/);
  });
});
