import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { createAutomationRoutes } from "./automation-routes.js";

// Standalone automation endpoint, for deployments that point
// UNREAL_AUTOMATION_URL at a separate process.
const app = new Hono();
app.get("/health", (c) => c.json({ status: "ok", service: "promptplay-automation" }));
app.route("/", createAutomationRoutes());

serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info(`Automation endpoint listening on ${config.host}:${info.port}`);
});
