import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createBuildPipeline } from "./services.js";

// Standalone build worker: polls JOBS_DIR and exports queued jobs into BUILD_DIR.
const { jobs, worker } = createBuildPipeline(config);
await jobs.init();
worker.start();

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    logger.info(`${signal} received, stopping build worker`);
    worker
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Build worker stop failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
  });
}
