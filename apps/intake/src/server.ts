import Fastify from "fastify";

import { LoggingCollaborators } from "./collaborators/logging";
import { loadIntakeServiceConfig } from "./config";
import { FileStudyRegistry } from "./config/study_registry";
import { INTAKE_APP_DIR, loadEnv } from "./env";
import { createLogger } from "./log";
import { registerIntakeRoutes } from "./routes";
import { IntakeRuntime } from "./runtime";
import { InMemorySessionStore } from "./session/memory_store";
import { findRepoRoot } from "./util";

const repoRoot = findRepoRoot(__dirname, "config/studies");
loadEnv(repoRoot, INTAKE_APP_DIR);

const config = loadIntakeServiceConfig(process.env, repoRoot);
const logger = createLogger("intake", config.log_level);

const app = Fastify({ logger: { level: config.log_level } });

app.addHook("onRequest", async (req, reply) => {
  reply.header("Access-Control-Allow-Origin", "*");
  reply.header("Access-Control-Allow-Headers", "content-type");
  reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  if (req.method === "OPTIONS") return reply.code(204).send();
});

async function main(): Promise<void> {
  const studies = new FileStudyRegistry(config.studies_dir, logger.child({ component: "study_registry" }));
  logger.info({ studies_dir: config.studies_dir, study_ids: studies.listStudyIds() }, "study configs available");

  const runtime = new IntakeRuntime({
    studies,
    sessions: new InMemorySessionStore(),
    collaborators: new LoggingCollaborators(logger.child({ component: "collaborators" })).asCollaborators(),
    logger,
    sessionTtlMs: config.session_ttl_ms,
    sweepIntervalMs: config.session_sweep_ms
  });
  registerIntakeRoutes(app, runtime);
  runtime.startSweeper();

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "shutting down");
    app
      .close()
      .then(() => {
        runtime.stop();
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
