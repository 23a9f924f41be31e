import { Hono } from "hono";
import { z } from "zod";
import { readJsonBody } from "../api/routes/read-json-body.js";
import { logger } from "../config/logger.js";
import { renderPreviewPage } from "./preview-page.js";

const MAX_NAME_LENGTH = 25;

const buildRequestSchema = z.object({
  script: z.string().refine((s) => s.trim().length > 0, "script must not be empty"),
});

/** Name under which a build is stored: spaces to underscores, lowercased, 25 code points. */
export function buildNameFor(script: string): string {
  return Array.from(script.replaceAll(" ", "_").toLowerCase())
    .slice(0, MAX_NAME_LENGTH)
    .join("");
}

/** In-memory store of rendered previews, keyed by build name. */
export class PreviewStore {
  private readonly pages = new Map<string, string>();

  put(name: string, html: string): void {
    this.pages.set(name, html);
  }

  get(name: string): string | null {
    return this.pages.get(name) ?? null;
  }

  get size(): number {
    return this.pages.size;
  }
}

/**
 * Built-in automation endpoint. Renders an HTML preview in place of a real
 * WebGL export and hands out a placeholder APK link.
 */
export function createAutomationRoutes(store: PreviewStore = new PreviewStore()): Hono {
  const routes = new Hono();

  routes.post("/build", async (c) => {
    const parsedBody = await readJsonBody(c);
    if (!parsedBody.ok) {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = buildRequestSchema.safeParse(parsedBody.body);
    if (!parsed.success) {
      return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
    }

    const { script } = parsed.data;
    const name = buildNameFor(script);
    store.put(name, renderPreviewPage(script));
    logger.info("Automation build stored", { name, previews: store.size });

    const encoded = encodeURIComponent(name);
    return c.json({
      webgl_url: `/preview/${encoded}`,
      apk_url: `/download/${encoded}.apk`,
    });
  });

  routes.get("/preview/:name", (c) => {
    const html = store.get(c.req.param("name"));
    if (html === null) {
      return c.html("<h2>Game not found!</h2>", 404);
    }
    return c.html(html);
  });

  routes.get("/download/:apkName", (c) => {
    const apkName = c.req.param("apkName");
    return c.json({
      message: `APK for ${apkName} generated (placeholder).`,
      download_hint: "Real .apk build integration is not available yet.",
    });
  });

  return routes;
}
