import type { Hono } from "hono";
import pg from "pg";
import type { Pool } from "pg";
import { createApp } from "./api/app.js";
import type { HealthInfo } from "./api/routes/health.js";
import { AutomationClient } from "./automation/automation-client.js";
import { createAutomationRoutes } from "./automation/automation-routes.js";
import type { Config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDb, type DrizzleDb, ensureSchema } from "./db/index.js";
import { DrizzleGameRepository } from "./games/drizzle-game-repository.js";
import { GameGenerationService } from "./games/game-generation-service.js";
import { InMemoryGameRepository } from "./games/in-memory-game-repository.js";
import type { IGameRepository } from "./games/repository-types.js";
import { GeminiTextModel } from "./generation/gemini-provider.js";
import { ScriptGenerator } from "./generation/script-generator.js";
import { BuildWorker } from "./jobs/build-worker.js";
import { GodotExporter } from "./jobs/godot-exporter.js";
import { JobStore } from "./jobs/job-store.js";

// Placeholder origin for in-process calls; requests never leave the process.
const IN_PROCESS_AUTOMATION_URL = "http://automation.internal";

export interface Services {
  app: Hono;
  games: GameGenerationService;
  jobs: JobStore;
  worker: BuildWorker;
  health: HealthInfo;
  /** Open Postgres pool, or null when records are kept in memory. */
  pool: Pool | null;
}

export interface ServiceOverrides {
  /** Use this database instead of opening a pool from config.database.url. */
  db?: DrizzleDb;
}

/** Job store and worker, shared by the web process and the standalone worker. */
export function createBuildPipeline(cfg: Config): { jobs: JobStore; worker: BuildWorker } {
  const jobs = new JobStore(cfg.jobs.jobsDir);
  const exporter = new GodotExporter({
    buildDir: cfg.jobs.buildDir,
    godotBin: cfg.godot.bin,
    exportPreset: cfg.godot.exportPreset,
  });
  const worker = new BuildWorker(jobs, exporter, { pollIntervalSeconds: cfg.jobs.pollInterval });
  return { jobs, worker };
}

/**
 * Wire every dependency from config. Without a database URL, records live in
 * memory; without an automation URL, the built-in automation routes are
 * mounted under /automation and called in-process.
 */
export async function createServices(cfg: Config, overrides: ServiceOverrides = {}): Promise<Services> {
  let pool: Pool | null = null;
  let repo: IGameRepository;
  let database: HealthInfo["database"];

  if (overrides.db) {
    await ensureSchema(overrides.db);
    repo = new DrizzleGameRepository(overrides.db);
    database = "postgres";
  } else if (cfg.database.url) {
    pool = new pg.Pool({ connectionString: cfg.database.url });
    const db = createDb(pool);
    await ensureSchema(db);
    repo = new DrizzleGameRepository(db);
    database = "postgres";
  } else {
    repo = new InMemoryGameRepository();
    database = "memory";
  }

  const model = cfg.gemini.apiKey ? new GeminiTextModel(cfg.gemini.apiKey, cfg.gemini.model) : null;

  let automation: AutomationClient;
  let automationRoutes: Hono | undefined;
  if (cfg.automation.url) {
    automation = new AutomationClient({
      baseUrl: cfg.automation.url,
      publicBaseUrl: cfg.publicBaseUrl,
      timeoutMs: cfg.automation.timeoutMs,
    });
  } else {
    const routes = createAutomationRoutes();
    automationRoutes = routes;
    automation = new AutomationClient(
      {
        baseUrl: IN_PROCESS_AUTOMATION_URL,
        publicBaseUrl: `${cfg.publicBaseUrl ?? ""}/automation`,
        timeoutMs: cfg.automation.timeoutMs,
      },
      async (url, init) => routes.request(url, init),
    );
  }

  const health: HealthInfo = { database, automation: automationRoutes ? "built-in" : "remote" };
  logger.info("Services wired", { ...health, model: model?.model ?? "placeholder" });

  const games = new GameGenerationService({ generator: new ScriptGenerator(model), automation, repo });
  const { jobs, worker } = createBuildPipeline(cfg);
  await jobs.init();

  const app = createApp({ games, jobs, buildDir: cfg.jobs.buildDir, health, automationRoutes });

  return { app, games, jobs, worker, health, pool };
}
