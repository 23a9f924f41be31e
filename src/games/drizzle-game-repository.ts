import { desc, eq } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { games } from "../db/schema/games.js";
import type {
  BuildArtifacts,
  GameRecord,
  GameStatus,
  IGameRepository,
  NewGameRecord,
  ScriptSource,
} from "./repository-types.js";

export class DrizzleGameRepository implements IGameRepository {
  constructor(private readonly db: DrizzleDb) {}

  async insert(record: NewGameRecord): Promise<GameRecord> {
    const rows = await this.db
      .insert(games)
      .values({ ...record, status: "pending", updatedAt: record.createdAt })
      .returning();
    return toRecord(rows[0]);
  }

  async markReady(id: string, artifacts: BuildArtifacts, at: number): Promise<GameRecord | null> {
    const rows = await this.db
      .update(games)
      .set({ status: "ready", webglUrl: artifacts.webglUrl, apkUrl: artifacts.apkUrl, error: null, updatedAt: at })
      .where(eq(games.id, id))
      .returning();
    return rows[0] ? toRecord(rows[0]) : null;
  }

  async markFailed(id: string, error: string, at: number): Promise<GameRecord | null> {
    const rows = await this.db
      .update(games)
      .set({ status: "failed", error, updatedAt: at })
      .where(eq(games.id, id))
      .returning();
    return rows[0] ? toRecord(rows[0]) : null;
  }

  async getById(id: string): Promise<GameRecord | null> {
    const rows = await this.db.select().from(games).where(eq(games.id, id));
    return rows[0] ? toRecord(rows[0]) : null;
  }

  async listRecent(limit: number): Promise<GameRecord[]> {
    const rows = await this.db.select().from(games).orderBy(desc(games.createdAt)).limit(limit);
    return rows.map(toRecord);
  }
}

function toStatus(raw: string): GameStatus {
  return raw === "ready" || raw === "failed" ? raw : "pending";
}

function toSource(raw: string): ScriptSource {
  return raw === "gemini" ? "gemini" : "placeholder";
}

function toRecord(row: typeof games.$inferSelect): GameRecord {
  return {
    id: row.id,
    prompt: row.prompt,
    name: row.name,
    script: row.script,
    scriptSource: toSource(row.scriptSource),
    model: row.model ?? null,
    status: toStatus(row.status),
    webglUrl: row.webglUrl ?? null,
    apkUrl: row.apkUrl ?? null,
    error: row.error ?? null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}
