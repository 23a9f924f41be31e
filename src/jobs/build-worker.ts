import { logger } from "../config/logger.js";
import { isoSeconds, type JobStore } from "./job-store.js";
import type { BuildJob } from "./types.js";

export interface JobExporter {
  export(job: BuildJob): Promise<string>;
}

export interface BuildWorkerRunResult {
  built: number;
  failed: number;
  skipped: number;
}

export interface BuildWorkerOptions {
  /** Seconds between scans. */
  pollIntervalSeconds: number;
  now?: () => Date;
}

/**
 * Polls the job directory and exports every queued job in turn.
 * A job moves queued → building → done | failed; anything else is left alone.
 */
export class BuildWorker {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<BuildWorkerRunResult> | null = null;
  private stopped = true;
  private readonly now: () => Date;

  constructor(
    private readonly store: JobStore,
    private readonly exporter: JobExporter,
    private readonly options: BuildWorkerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async runOnce(): Promise<BuildWorkerRunResult> {
    const result: BuildWorkerRunResult = { built: 0, failed: 0, skipped: 0 };

    for (const file of await this.store.listFiles()) {
      const job = await this.store.load(file);
      if (!job || job.status !== "queued") {
        result.skipped++;
        continue;
      }

      const building: BuildJob = { ...job, status: "building" };
      await this.store.save(building);

      try {
        const outputUrl = await this.exporter.export(building);
        await this.store.save({
          ...building,
          status: "done",
          output_url: outputUrl,
          finished_at: isoSeconds(this.now()),
        });
        result.built++;
        logger.info(`Build job ${job.job_id} done`, { outputUrl });
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        await this.store.save({ ...building, status: "failed", error: msg });
        result.failed++;
        logger.error(`Build job ${job.job_id} failed`, { error: msg });
      }
    }

    return result;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    logger.info(`Build worker started, watching ${this.store.jobsDir}`);
    // A scan still finishing from before stop() reschedules itself.
    if (!this.running && !this.timer) this.schedule(0);
  }

  /** Stop polling and wait for an in-flight scan to finish. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    this.running = this.runOnce();
    try {
      await this.running;
    } catch (err) {
      logger.error("Build worker scan failed", { error: err instanceof Error ? err.message : String(err) });
    } finally {
      this.running = null;
    }
    if (!this.stopped) this.schedule(this.options.pollIntervalSeconds * 1000);
  }
}
