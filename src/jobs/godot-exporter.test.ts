import { access, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

import type { CommandResult, CommandRunner } from "../infrastructure/command-runner.js";
import { GodotExporter, GodotExportError } from "./godot-exporter.js";
import type { BuildJob } from "./types.js";

const job: BuildJob = {
  job_id: "job-1",
  repo_url: "https://git.example.test/team/game.git",
  status: "building",
  created_at: "2026-03-01T09:00:00Z",
};

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

describe("GodotExporter", () => {
  let buildDir: string;
  let calls: Array<{ command: string; args: string[] }>;

  beforeEach(async () => {
    buildDir = await mkdtemp(path.join(tmpdir(), "builds-"));
    calls = [];
  });

  afterEach(async () => {
    await rm(buildDir, { recursive: true, force: true });
  });

  /** Fake git creates the checkout; fake godot writes index.html or fails with `godotResult`. */
  function fakeRunner(godotResult: CommandResult = { code: 0, stdout: "", stderr: "" }): CommandRunner {
    return async (command, args) => {
      calls.push({ command, args });
      if (command === "git") {
        await mkdir(args[args.length - 1], { recursive: true });
        return { code: 0, stdout: "", stderr: "" };
      }
      if (godotResult.code === 0) {
        await writeFile(args[args.length - 1], "<html>game</html>");
      }
      return godotResult;
    };
  }

  it("clones, exports and publishes the web build", async () => {
    const exporter = new GodotExporter({ buildDir, godotBin: "/opt/godot" }, fakeRunner());

    const url = await exporter.export(job);

    expect(url).toBe("/static/job-1/index.html");
    const workdir = path.join(buildDir, "work_job-1");
    expect(calls).toEqual([
      { command: "git", args: ["clone", "--depth", "1", "--", job.repo_url, workdir] },
      {
        command: "/opt/godot",
        args: [
          "--headless",
          "--path",
          workdir,
          "--export-release",
          "Web",
          path.join(workdir, "web", "index.html"),
        ],
      },
    ]);
    expect(await readFile(path.join(buildDir, "job-1", "index.html"), "utf8")).toBe("<html>game</html>");
    expect(await exists(workdir)).toBe(false);
  });

  it("uses the configured export preset", async () => {
    const exporter = new GodotExporter({ buildDir, godotBin: "godot", exportPreset: "HTML5" }, fakeRunner());
    await exporter.export(job);
    expect(calls[1].args[4]).toBe("HTML5");
  });

  it("replaces a previous export for the same job", async () => {
    await mkdir(path.join(buildDir, "job-1"), { recursive: true });
    await writeFile(path.join(buildDir, "job-1", "stale.js"), "old");
    const exporter = new GodotExporter({ buildDir, godotBin: "godot" }, fakeRunner());

    await exporter.export(job);

    expect(await exists(path.join(buildDir, "job-1", "stale.js"))).toBe(false);
  });

  it("reports the exit code and output when godot fails, and cleans up", async () => {
    const exporter = new GodotExporter(
      { buildDir, godotBin: "godot" },
      fakeRunner({ code: 1, stdout: "loading", stderr: "No export template found" }),
    );

    const err = await exporter.export(job).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GodotExportError);
    expect((err as GodotExportError).message).toBe(
      "Godot export failed: rc=1 stdout=loading stderr=No export template found",
    );
    expect(await exists(path.join(buildDir, "work_job-1"))).toBe(false);
    expect(await exists(path.join(buildDir, "job-1"))).toBe(false);
  });

  it("fails when git clone fails", async () => {
    const runner: CommandRunner = async () => ({ code: 128, stdout: "", stderr: "repository not found\n" });
    const exporter = new GodotExporter({ buildDir, godotBin: "godot" }, runner);

    await expect(exporter.export(job)).rejects.toThrow("git exited with 128: repository not found");
  });
});
