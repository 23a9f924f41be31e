import type { Context } from "hono";

export type JsonBody = { ok: true; body: unknown } | { ok: false };

/** Parse the request body as JSON. An empty body reads as `{}`. */
export async function readJsonBody(c: Context): Promise<JsonBody> {
  try {
    const text = await c.req.text();
    return { ok: true, body: text ? JSON.parse(text) : {} };
  } catch {
    return { ok: false };
  }
}
