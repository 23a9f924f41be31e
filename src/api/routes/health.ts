import { Hono } from "hono";

export interface HealthInfo {
  database: "postgres" | "memory";
  automation: "remote" | "built-in";
}

// Public, unauthenticated, used by load balancers and the deploy platform.
export function createHealthRoutes(info: HealthInfo, now: () => Date = () => new Date()): Hono {
  const routes = new Hono();

  routes.get("/", (c) =>
    c.json({
      status: "ok",
      service: "promptplay-server",
      timestamp: now().toISOString(),
      database: info.database,
      automation: info.automation,
    }),
  );

  return routes;
}
