#!/usr/bin/env node
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { EngineInstallError, installEngine } from "./installer.js";

const withTemplates = process.argv.slice(2).includes("--with-templates");

try {
  const installed = await installEngine({
    versions: config.godot.versions,
    baseUrl: config.godot.baseUrl,
    installPath: config.godot.installPath,
    withTemplates,
  });
  logger.info(`Engine ready at ${installed.binaryPath}`, { reportedVersion: installed.reportedVersion });
} catch (err) {
  if (err instanceof EngineInstallError) {
    logger.error(err.message, { failures: err.failures });
  } else {
    logger.error("Engine install failed", { err });
  }
  process.exit(1);
}
