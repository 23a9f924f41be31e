import { cp, mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { logger } from "../config/logger.js";
import { type CommandRunner, execFileRunner, runChecked } from "../infrastructure/command-runner.js";
import type { BuildJob } from "./types.js";

export interface GodotExporterConfig {
  buildDir: string;
  godotBin: string;
  /** Export preset name in the project's export_presets.cfg (default: "Web") */
  exportPreset?: string;
  /** Per-command timeout in ms (default: 10 minutes) */
  timeoutMs?: number;
}

export class GodotExportError extends Error {
  constructor(
    readonly code: number,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    super(`Godot export failed: rc=${code} stdout=${stdout.trim()} stderr=${stderr.trim()}`);
    this.name = "GodotExportError";
  }
}

/**
 * Clones a Godot project and exports it for the web. The finished export is
 * copied to <buildDir>/<jobId>, which the API serves under /static.
 */
export class GodotExporter {
  private readonly exportPreset: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly config: GodotExporterConfig,
    private readonly run: CommandRunner = execFileRunner,
  ) {
    this.exportPreset = config.exportPreset ?? "Web";
    this.timeoutMs = config.timeoutMs ?? 10 * 60_000;
  }

  workdirFor(jobId: string): string {
    return path.join(this.config.buildDir, `work_${jobId}`);
  }

  outputDirFor(jobId: string): string {
    return path.join(this.config.buildDir, jobId);
  }

  /** Returns the public URL of the exported index.html. */
  async export(job: BuildJob): Promise<string> {
    const workdir = this.workdirFor(job.job_id);
    const exportDir = path.join(workdir, "web");
    const outputDir = this.outputDirFor(job.job_id);

    await rm(workdir, { recursive: true, force: true });
    await mkdir(this.config.buildDir, { recursive: true });

    try {
      logger.info(`Cloning ${job.repo_url}`, { jobId: job.job_id });
      await runChecked(this.run, "git", ["clone", "--depth", "1", "--", job.repo_url, workdir], {
        timeoutMs: this.timeoutMs,
      });

      await mkdir(exportDir, { recursive: true });

      const result = await this.run(
        this.config.godotBin,
        [
          "--headless",
          "--path",
          workdir,
          "--export-release",
          this.exportPreset,
          path.join(exportDir, "index.html"),
        ],
        { timeoutMs: this.timeoutMs },
      );
      if (result.code !== 0) {
        throw new GodotExportError(result.code, result.stdout, result.stderr);
      }

      await rm(outputDir, { recursive: true, force: true });
      await cp(exportDir, outputDir, { recursive: true });
      return `/static/${job.job_id}/index.html`;
    } finally {
      await rm(workdir, { recursive: true, force: true });
    }
  }
}
