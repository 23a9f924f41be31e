import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

import { AutomationError } from "../automation/automation-client.js";
import { ScriptGenerator } from "../generation/script-generator.js";
import { GameGenerationService, tagScript } from "./game-generation-service.js";
import { InMemoryGameRepository } from "./in-memory-game-repository.js";

describe("GameGenerationService", () => {
  let repo: InMemoryGameRepository;
  let clock: number;
  const build = vi.fn();

  function createService() {
    return new GameGenerationService({
      generator: new ScriptGenerator(null),
      automation: { build },
      repo,
      now: () => clock++,
      newId: () => "game-1",
    });
  }

  beforeEach(() => {
    repo = new InMemoryGameRepository();
    clock = 1000;
    build.mockReset();
  });

  it("generates, builds and stores a ready record", async () => {
    build.mockResolvedValue({ webglUrl: "/automation/preview/red_square", apkUrl: "/automation/download/red_square.apk" });

    const game = await createService().generate("Red Square");

    expect(game).toMatchObject({
      id: "game-1",
      prompt: "Red Square",
      name: "red_square",
      scriptSource: "placeholder",
      model: null,
      status: "ready",
      webglUrl: "/automation/preview/red_square",
      apkUrl: "/automation/download/red_square.apk",
      error: null,
      createdAt: 1000,
      updatedAt: 1001,
    });
    expect(build).toHaveBeenCalledWith(tagScript("game-1", game.script));
    expect(await repo.getById("game-1")).toEqual(game);
  });

  it("marks the record failed and rethrows when the build fails", async () => {
    build.mockRejectedValue(new AutomationError("Automation endpoint returned 503", 503));

    await expect(createService().generate("pong")).rejects.toBeInstanceOf(AutomationError);

    const stored = await repo.getById("game-1");
    expect(stored?.status).toBe("failed");
    expect(stored?.error).toBe("Automation endpoint returned 503");
  });

  it("leads the submitted script with the record id", () => {
    expect(tagScript("game-7", "extends Node2D")).toBe("# game-7\nextends Node2D");
  });

  it("does not mark a built game failed when storing the result fails", async () => {
    build.mockResolvedValue({ webglUrl: "/preview/a", apkUrl: "/download/a.apk" });
    vi.spyOn(repo, "markReady").mockRejectedValue(new Error("connection terminated"));
    const markFailed = vi.spyOn(repo, "markFailed");

    await expect(createService().generate("pong")).rejects.toThrow("connection terminated");

    expect(markFailed).not.toHaveBeenCalled();
    expect((await repo.getById("game-1"))?.status).toBe("pending");
  });

  it("keeps the build error when recording the failure also fails", async () => {
    build.mockRejectedValue(new AutomationError("Automation endpoint returned 503", 503));
    vi.spyOn(repo, "markFailed").mockRejectedValue(new Error("connection terminated"));

    await expect(createService().generate("pong")).rejects.toThrow("Automation endpoint returned 503");
  });

  it("stores nothing when the prompt is rejected", async () => {
    await expect(createService().generate("")).rejects.toThrow("Prompt must be a non-empty string");
    expect(build).not.toHaveBeenCalled();
    expect(await repo.listRecent(10)).toEqual([]);
  });

  it("clamps list limits to 1..100", async () => {
    const spy = vi.spyOn(repo, "listRecent");
    const service = createService();

    await service.listRecent(0);
    await service.listRecent(500);
    await service.listRecent(Number.NaN);
    await service.listRecent();

    expect(spy.mock.calls.map((c) => c[0])).toEqual([1, 100, 20, 20]);
  });
});
