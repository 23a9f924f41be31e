import { Hono } from "hono";
import type { JobStore } from "../../jobs/job-store.js";
import { createJobSchema } from "../../jobs/types.js";
import { readJsonBody } from "./read-json-body.js";

// Jobs are queued here and picked up by the build worker.
export function createJobRoutes(store: JobStore): Hono {
  const routes = new Hono();

  routes.post("/", async (c) => {
    const parsedBody = await readJsonBody(c);
    if (!parsedBody.ok) {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = createJobSchema.safeParse(parsedBody.body);
    if (!parsed.success) {
      return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
    }

    const job = await store.create(parsed.data.repo_url);
    return c.json(job, 202);
  });

  routes.get("/:id", async (c) => c.json(await store.get(c.req.param("id"))));

  return routes;
}
