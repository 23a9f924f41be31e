import { Hono } from "hono";
import { z } from "zod";
import type { GameGenerationService } from "../../games/game-generation-service.js";
import type { GameRecord } from "../../games/repository-types.js";
import { readJsonBody } from "./read-json-body.js";

const generateSchema = z.object({
  prompt: z.string(),
});

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

/** Listing shape: everything but the script body. */
export function toGameSummary(game: GameRecord) {
  return {
    id: game.id,
    name: game.name,
    prompt: game.prompt,
    status: game.status,
    webgl_url: game.webglUrl,
    apk_url: game.apkUrl,
    script_source: game.scriptSource,
    created_at: iso(game.createdAt),
  };
}

export function toGameDetail(game: GameRecord) {
  return {
    ...toGameSummary(game),
    script: game.script,
    model: game.model,
    error: game.error,
    updated_at: iso(game.updatedAt),
  };
}

/**
 * POST /generate, GET /games, GET /games/:id.
 *
 * Generation runs inline: the response waits for the script and the build.
 * Domain errors (bad prompt, model or automation failure) reach the app's
 * error handler with their own status.
 */
export function createGameRoutes(service: GameGenerationService): Hono {
  const routes = new Hono();

  routes.post("/generate", async (c) => {
    const parsedBody = await readJsonBody(c);
    if (!parsedBody.ok) {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = generateSchema.safeParse(parsedBody.body);
    if (!parsed.success) {
      return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
    }

    const game = await service.generate(parsed.data.prompt);
    return c.json(
      {
        id: game.id,
        name: game.name,
        status: game.status,
        webgl_url: game.webglUrl,
        apk_url: game.apkUrl,
        script_source: game.scriptSource,
      },
      201,
    );
  });

  routes.get("/games", async (c) => {
    const raw = c.req.query("limit");
    const games = await service.listRecent(raw === undefined ? undefined : Number(raw));
    return c.json({ games: games.map(toGameSummary) });
  });

  routes.get("/games/:id", async (c) => {
    const game = await service.get(c.req.param("id"));
    if (!game) return c.json({ error: "Game not found" }, 404);
    return c.json(toGameDetail(game));
  });

  return routes;
}
