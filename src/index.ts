import { serve } from "@hono/node-server";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createServices } from "./services.js";
import { validateRequiredEnvVars } from "./validate-env.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // Winston's Console transport is synchronous, so the log line is out before exit.
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

validateRequiredEnvVars();

const services = await createServices(config);

if (config.jobs.runWorker) {
  services.worker.start();
}

const server = serve({ fetch: services.app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info(`promptplay-server listening on http://${config.host}:${info.port}`);
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, shutting down`);

  await services.worker.stop();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  if (services.pool) await services.pool.end();

  logger.info("Shutdown complete");
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  });
}
