import { createWriteStream } from "node:fs";
import { chmod, cp, mkdir, mkdtemp, rm, stat } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { FetchFn } from "../automation/automation-client.js";
import { logger } from "../config/logger.js";
import { type CommandRunner, execFileRunner, runChecked } from "../infrastructure/command-runner.js";
import { parseEngineVersion, releaseAssets, releaseUrl } from "./version.js";

export const MIN_ARCHIVE_BYTES = 10 * 1024 * 1024;

export interface InstallEngineOptions {
  /** Versions to try, in order; the first that fully installs wins. */
  versions: string[];
  baseUrl: string;
  installPath: string;
  /** Also install export templates (needed for headless web exports). */
  withTemplates?: boolean;
  /** Default: ~/.local/share/godot/export_templates */
  templatesRoot?: string;
  /** Download tries per asset (default: 3) */
  attempts?: number;
  /** Backoff unit; try N waits N × this before the next (default: 2000) */
  retryDelayMs?: number;
  /** Bound on one download try, body included (default: 10 minutes) */
  downloadTimeoutMs?: number;
  minArchiveBytes?: number;
  fetchFn?: FetchFn;
  run?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
}

export interface InstalledEngine {
  version: string;
  /** What the binary printed for --version */
  reportedVersion: string;
  binaryPath: string;
}

export class EngineInstallError extends Error {
  constructor(readonly failures: Array<{ version: string; error: string }>) {
    super(
      `No engine binary installed. Tried: ${failures.map((f) => `${f.version} (${f.error})`).join("; ") || "nothing"}`,
    );
    this.name = "EngineInstallError";
  }
}

export class ArchiveTooSmallError extends Error {
  constructor(
    readonly url: string,
    readonly bytes: number,
    readonly minBytes: number,
  ) {
    super(`Archive ${url} is ${bytes} bytes, expected at least ${minBytes}`);
    this.name = "ArchiveTooSmallError";
  }
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

interface ResolvedOptions {
  attempts: number;
  retryDelayMs: number;
  downloadTimeoutMs: number;
  minArchiveBytes: number;
  fetchFn: FetchFn;
  run: CommandRunner;
  sleep: (ms: number) => Promise<void>;
}

/**
 * Stream `url` into `dest`, retrying with linear backoff. Files below the
 * size floor count as failed tries (error pages, truncated transfers).
 */
export async function downloadWithRetry(url: string, dest: string, opts: ResolvedOptions): Promise<number> {
  let lastError: Error = new Error(`No download attempted for ${url}`);

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      const res = await opts.fetchFn(url, {
        redirect: "follow",
        signal: AbortSignal.timeout(opts.downloadTimeoutMs),
      });
      if (!res.ok) {
        await res.body?.cancel();
        throw new Error(`HTTP ${res.status} for ${url}`);
      }
      if (!res.body) throw new Error(`Empty response body for ${url}`);
      await pipeline(Readable.fromWeb(res.body), createWriteStream(dest));
      const { size } = await stat(dest);
      if (size < opts.minArchiveBytes) {
        throw new ArchiveTooSmallError(url, size, opts.minArchiveBytes);
      }
      return size;
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Download attempt ${attempt}/${opts.attempts} failed`, { url, error: lastError.message });
      if (attempt < opts.attempts) await opts.sleep(opts.retryDelayMs * attempt);
    }
  }

  throw lastError;
}

async function installVersion(
  version: string,
  options: InstallEngineOptions,
  opts: ResolvedOptions,
): Promise<InstalledEngine> {
  const assets = releaseAssets(version);
  const workdir = await mkdtemp(path.join(tmpdir(), `godot-${version}-`));

  try {
    const archive = path.join(workdir, assets.archive);
    const bytes = await downloadWithRetry(releaseUrl(options.baseUrl, version, assets.archive), archive, opts);
    logger.info(`Downloaded ${assets.archive}`, { bytes });

    await runChecked(opts.run, "unzip", ["-o", archive, "-d", workdir]);

    await mkdir(path.dirname(options.installPath), { recursive: true });
    await cp(path.join(workdir, assets.binary), options.installPath);
    await chmod(options.installPath, 0o755);

    const result = await runChecked(opts.run, options.installPath, ["--version"]);
    const reportedVersion = parseEngineVersion(result.stdout);
    if (!reportedVersion) {
      throw new Error(`Installed binary did not report a version: ${result.stdout.trim() || "(no output)"}`);
    }

    if (options.withTemplates) {
      await installTemplates(version, workdir, options, opts);
    }

    return { version, reportedVersion, binaryPath: options.installPath };
  } finally {
    await rm(workdir, { recursive: true, force: true });
  }
}

async function installTemplates(
  version: string,
  workdir: string,
  options: InstallEngineOptions,
  opts: ResolvedOptions,
): Promise<void> {
  const assets = releaseAssets(version);
  const tpz = path.join(workdir, assets.templates);
  await downloadWithRetry(releaseUrl(options.baseUrl, version, assets.templates), tpz, opts);

  const extractDir = path.join(workdir, "tpz");
  await runChecked(opts.run, "unzip", ["-o", tpz, "-d", extractDir]);

  const root = options.templatesRoot ?? path.join(homedir(), ".local", "share", "godot", "export_templates");
  const target = path.join(root, `${version}.stable`);
  await rm(target, { recursive: true, force: true });
  await mkdir(root, { recursive: true });
  await cp(path.join(extractDir, "templates"), target, { recursive: true });
  logger.info(`Export templates installed to ${target}`);
}

/**
 * Install the first engine version that downloads, unpacks and reports a
 * version string. Throws EngineInstallError when every version fails.
 */
export async function installEngine(options: InstallEngineOptions): Promise<InstalledEngine> {
  const opts: ResolvedOptions = {
    attempts: options.attempts ?? 3,
    retryDelayMs: options.retryDelayMs ?? 2000,
    downloadTimeoutMs: options.downloadTimeoutMs ?? 10 * 60_000,
    minArchiveBytes: options.minArchiveBytes ?? MIN_ARCHIVE_BYTES,
    fetchFn: options.fetchFn ?? fetch,
    run: options.run ?? execFileRunner,
    sleep: options.sleep ?? defaultSleep,
  };

  const failures: Array<{ version: string; error: string }> = [];

  for (const version of options.versions) {
    try {
      const installed = await installVersion(version, options, opts);
      logger.info(`Engine ${version} installed`, { ...installed });
      return installed;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.warn(`Engine ${version} could not be installed, trying next version`, { error: msg });
      failures.push({ version, error: msg });
    }
  }

  throw new EngineInstallError(failures);
}
