import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { type BuildJob, buildJobSchema, InvalidRepoUrlError, JobNotFoundError } from "./types.js";

/** Only allow safe characters in IDs used for filesystem paths. */
const SAFE_ID_RE = /^[a-zA-Z0-9_-]+$/;

/** Format a Date the way job files carry timestamps: second precision, Z suffix. */
export function isoSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function assertCloneableUrl(repoUrl: string): void {
  let parsed: URL;
  try {
    parsed = new URL(repoUrl);
  } catch {
    throw new InvalidRepoUrlError(repoUrl);
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new InvalidRepoUrlError(repoUrl);
  }
}

/**
 * Build jobs as one JSON file each under a directory shared by the web
 * process and the worker. Writes go to a temp file and are renamed into
 * place, so a reader never sees a half-written job.
 */
export class JobStore {
  constructor(
    readonly jobsDir: string,
    private readonly newId: () => string = randomUUID,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async init(): Promise<void> {
    await mkdir(this.jobsDir, { recursive: true });
  }

  pathFor(jobId: string): string {
    return path.join(this.jobsDir, `${jobId}.json`);
  }

  async create(repoUrl: string): Promise<BuildJob> {
    const trimmed = repoUrl.trim();
    assertCloneableUrl(trimmed);
    const job: BuildJob = {
      job_id: this.newId(),
      repo_url: trimmed,
      status: "queued",
      created_at: isoSeconds(this.now()),
    };
    await this.init();
    await this.save(job);
    return job;
  }

  async get(jobId: string): Promise<BuildJob> {
    if (!SAFE_ID_RE.test(jobId)) throw new JobNotFoundError(jobId);
    const job = await this.load(this.pathFor(jobId));
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /** Every readable job; unreadable or foreign files are skipped. */
  async list(): Promise<BuildJob[]> {
    const files = await this.listFiles();
    const jobs: BuildJob[] = [];
    for (const file of files) {
      const job = await this.load(file);
      if (job) jobs.push(job);
    }
    return jobs;
  }

  /** Absolute paths of *.json files in the jobs directory. */
  async listFiles(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.jobsDir);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw err;
    }
    return names
      .filter((n) => n.endsWith(".json"))
      .sort()
      .map((n) => path.join(this.jobsDir, n));
  }

  /** Parse a job file; null when missing, empty, mid-write or malformed. */
  async load(file: string): Promise<BuildJob | null> {
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = buildJobSchema.safeParse(data);
    return parsed.success ? parsed.data : null;
  }

  async save(job: BuildJob): Promise<void> {
    const file = this.pathFor(job.job_id);
    const tmp = `${file}.tmp`;
    await writeFile(tmp, `${JSON.stringify(job, null, 2)}\n`, "utf8");
    await rename(tmp, file);
  }
}

function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}
