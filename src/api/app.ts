import path from "node:path";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import type { GameGenerationService } from "../games/game-generation-service.js";
import type { JobStore } from "../jobs/job-store.js";
import { createGameRoutes } from "./routes/games.js";
import { createHealthRoutes, type HealthInfo } from "./routes/health.js";
import { createJobRoutes } from "./routes/jobs.js";

export interface AppDeps {
  games: GameGenerationService;
  jobs: JobStore;
  /** Directory served under /static (web exports from the build worker). */
  buildDir: string;
  health: HealthInfo;
  /** Built-in automation endpoint, mounted under /automation when present. */
  automationRoutes?: Hono;
  now?: () => Date;
}

const DOMAIN_STATUSES = [400, 404, 409, 422, 502, 503] as const;
type DomainStatus = (typeof DOMAIN_STATUSES)[number];

function domainStatus(err: Error): DomainStatus | null {
  const status = "httpStatus" in err ? err.httpStatus : undefined;
  return DOMAIN_STATUSES.find((s) => s === status) ?? null;
}

export const errorHandler: Parameters<Hono["onError"]>[0] = (err, c) => {
  const status = domainStatus(err);
  if (status !== null) {
    logger.warn("Request failed", { error: err.message, name: err.name, status, path: c.req.path });
    return c.json({ error: err.message }, status);
  }

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use("/*", cors());
  app.use("/*", secureHeaders());

  app.get("/", (c) => c.json({ message: "promptplay-server is running" }));
  app.route("/health", createHealthRoutes(deps.health, deps.now));
  app.route("/", createGameRoutes(deps.games));
  app.route("/jobs", createJobRoutes(deps.jobs));

  if (deps.automationRoutes) {
    app.route("/automation", deps.automationRoutes);
  }

  app.use(
    "/static/*",
    serveStatic({
      // serveStatic resolves its root against the working directory.
      root: path.relative(process.cwd(), deps.buildDir) || ".",
      rewriteRequestPath: (p) => p.replace(/^\/static/, ""),
    }),
  );

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError(errorHandler);

  return app;
}
