import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { PGlite } from "@electric-sql/pglite";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("./config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

import { loadConfig } from "./config/index.js";
import { createServices } from "./services.js";
import { createTestDb } from "./test/db.js";

describe("createServices", () => {
  let dataDir: string;
  let pglite: PGlite | null;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(tmpdir(), "services-"));
    pglite = null;
  });

  afterEach(async () => {
    if (pglite) await pglite.close();
    await rm(dataDir, { recursive: true, force: true });
  });

  function testConfig(env: Record<string, string> = {}) {
    return loadConfig({
      NODE_ENV: "test",
      JOBS_DIR: path.join(dataDir, "jobs"),
      BUILD_DIR: path.join(dataDir, "builds"),
      ...env,
    });
  }

  it("falls back to memory records and the built-in automation endpoint", async () => {
    const services = await createServices(testConfig());

    expect(services.health).toEqual({ database: "memory", automation: "built-in" });
    expect(services.pool).toBeNull();

    const res = await services.app.request("/generate", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ prompt: "blue circle" }),
    });
    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body.webgl_url).toMatch(/^\/automation\/preview\//);

    const preview = await services.app.request(body.webgl_url);
    expect(preview.status).toBe(200);
  });

  it("prefixes in-process artifact URLs with the public base URL", async () => {
    const services = await createServices(testConfig({ PUBLIC_BASE_URL: "https://games.example.test" }));

    const game = await services.games.generate("pong");

    expect(game.apkUrl).toMatch(/^https:\/\/games\.example\.test\/automation\/download\/.+\.apk$/);
  });

  it("reports a remote automation endpoint without mounting the built-in one", async () => {
    const services = await createServices(testConfig({ UNREAL_AUTOMATION_URL: "http://automation.example.test" }));

    expect(services.health.automation).toBe("remote");
    expect((await services.app.request("/automation/preview/x")).status).toBe(404);
  });

  it("stores records in Postgres when a database is given", async () => {
    const { db, pool } = await createTestDb();
    pglite = pool;
    const services = await createServices(testConfig(), { db });

    const game = await services.games.generate("maze");

    expect(services.health.database).toBe("postgres");
    expect((await services.games.get(game.id))?.status).toBe("ready");
  });

  it("creates the jobs directory up front", async () => {
    const services = await createServices(testConfig());
    expect(await services.jobs.list()).toEqual([]);
  });
});
