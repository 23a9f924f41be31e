import { z } from "zod";

export const DEFAULT_GODOT_VERSIONS = ["4.2.1", "4.2.2", "4.3"];
export const DEFAULT_GODOT_BASE_URL = "https://github.com/godotengine/godot/releases/download";

/**
 * Parse a comma-separated list of engine versions, e.g. "4.2.1,4.2.2".
 * Blank entries are dropped; an empty list falls back to the defaults.
 */
export function parseVersionList(raw: string | undefined): string[] {
  if (!raw) return DEFAULT_GODOT_VERSIONS;
  const versions = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return versions.length > 0 ? versions : DEFAULT_GODOT_VERSIONS;
}

/** "true"/"1"/"yes" are on; anything else (including unset) is off. */
const envFlag = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((v) => (typeof v === "boolean" ? v : ["true", "1", "yes"].includes((v ?? "").trim().toLowerCase())));

const optionalString = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

export const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(10000),
  host: z.string().default("0.0.0.0"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  /** Prefix for artifact URLs that come back relative. */
  publicBaseUrl: optionalString,

  gemini: z.object({
    apiKey: optionalString,
    model: z.string().default("gemini-1.5-flash"),
  }),

  /** Hosted Postgres (Supabase connection string). Absent = in-memory records. */
  database: z.object({
    url: optionalString,
    supabaseUrl: optionalString,
    supabaseKey: optionalString,
  }),

  automation: z.object({
    /** Remote automation endpoint. Absent = built-in routes under /automation. */
    url: optionalString,
    timeoutMs: z.coerce.number().int().positive().default(30_000),
  }),

  godot: z.object({
    bin: z.string().default("godot"),
    versions: z.array(z.string().min(1)).min(1).default(DEFAULT_GODOT_VERSIONS),
    baseUrl: z.string().url().default(DEFAULT_GODOT_BASE_URL),
    installPath: z.string().default("/usr/local/bin/godot"),
    exportPreset: z.string().min(1).default("Web"),
  }),

  jobs: z.object({
    jobsDir: z.string().default("./data/jobs"),
    buildDir: z.string().default("./data/builds"),
    /** Seconds between worker scans. */
    pollInterval: z.coerce.number().positive().default(4),
    runWorker: envFlag,
  }),
});

export type Config = z.infer<typeof configSchema>;

/** Map raw environment variables onto the config schema. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: env.PORT,
    host: env.HOST,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    publicBaseUrl: env.PUBLIC_BASE_URL,
    gemini: {
      apiKey: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL,
    },
    database: {
      url: env.DATABASE_URL || env.SUPABASE_DB_URL,
      supabaseUrl: env.SUPABASE_URL,
      supabaseKey: env.SUPABASE_KEY,
    },
    automation: {
      url: env.UNREAL_AUTOMATION_URL,
      timeoutMs: env.AUTOMATION_TIMEOUT_MS,
    },
    godot: {
      bin: env.GODOT_BIN,
      versions: parseVersionList(env.GODOT_VERSIONS),
      baseUrl: env.GODOT_BASE_URL,
      installPath: env.GODOT_INSTALL_PATH,
      exportPreset: env.GODOT_EXPORT_PRESET,
    },
    jobs: {
      jobsDir: env.JOBS_DIR,
      buildDir: env.BUILD_DIR,
      pollInterval: env.POLL_INTERVAL,
      runWorker: env.RUN_WORKER,
    },
  });
}

export const config = loadConfig();
