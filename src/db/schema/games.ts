import { bigint, index, pgTable, text } from "drizzle-orm/pg-core";

export const games = pgTable(
  "games",
  {
    id: text("id").primaryKey(),
    /** Prompt as the user typed it (trimmed) */
    prompt: text("prompt").notNull(),
    /** URL-safe slug derived from the prompt */
    name: text("name").notNull(),
    /** Generated GDScript source */
    script: text("script").notNull(),
    /** "gemini" | "placeholder" */
    scriptSource: text("script_source").notNull(),
    model: text("model"),
    /** "pending" | "ready" | "failed" */
    status: text("status").notNull().default("pending"),
    webglUrl: text("webgl_url"),
    apkUrl: text("apk_url"),
    error: text("error"),
    /** Unix epoch ms */
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    /** Unix epoch ms */
    updatedAt: bigint("updated_at", { mode: "number" }).notNull(),
  },
  (table) => [index("idx_games_created_at").on(table.createdAt), index("idx_games_status").on(table.status)],
);
