import { logger } from "./config/logger.js";

/**
 * Startup environment variable validation.
 *
 * Throws on values the server cannot start with. Warns on missing
 * recommended vars; the server still runs with its fallbacks.
 * Skipped in test environment.
 */
export function validateRequiredEnvVars(env: NodeJS.ProcessEnv = process.env): string[] {
  if (env.NODE_ENV === "test") return [];

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical ---

  const dbUrl = env.DATABASE_URL || env.SUPABASE_DB_URL;
  if (dbUrl && !/^postgres(ql)?:\/\//.test(dbUrl)) {
    errors.push("DATABASE_URL must be a postgres:// or postgresql:// connection string");
  }

  const automationUrl = env.UNREAL_AUTOMATION_URL;
  if (automationUrl && !/^https?:\/\//.test(automationUrl)) {
    errors.push("UNREAL_AUTOMATION_URL must be an http(s) URL");
  }

  // --- Recommended ---

  if (!env.GEMINI_API_KEY) {
    warnings.push("GEMINI_API_KEY is not set. Games will use the placeholder script.");
  }

  if (!dbUrl) {
    warnings.push("DATABASE_URL is not set. Game records are kept in memory and lost on restart.");
    if (env.SUPABASE_URL || env.SUPABASE_KEY) {
      warnings.push(
        "SUPABASE_URL/SUPABASE_KEY are set but unused. Set DATABASE_URL to the project's Postgres connection string.",
      );
    }
  }

  // --- Emit ---

  for (const w of warnings) {
    logger.warn(`[env] ${w}`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }

  return warnings;
}
