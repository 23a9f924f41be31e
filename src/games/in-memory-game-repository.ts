import type { BuildArtifacts, GameRecord, IGameRepository, NewGameRecord } from "./repository-types.js";

/** Process-local store used when no database URL is configured. */
export class InMemoryGameRepository implements IGameRepository {
  private readonly records = new Map<string, GameRecord>();

  async insert(record: NewGameRecord): Promise<GameRecord> {
    if (this.records.has(record.id)) {
      throw new Error(`Game ${record.id} already exists`);
    }
    const stored: GameRecord = {
      ...record,
      status: "pending",
      webglUrl: null,
      apkUrl: null,
      error: null,
      updatedAt: record.createdAt,
    };
    this.records.set(stored.id, stored);
    return { ...stored };
  }

  async markReady(id: string, artifacts: BuildArtifacts, at: number): Promise<GameRecord | null> {
    return this.patch(id, {
      status: "ready",
      webglUrl: artifacts.webglUrl,
      apkUrl: artifacts.apkUrl,
      error: null,
      updatedAt: at,
    });
  }

  async markFailed(id: string, error: string, at: number): Promise<GameRecord | null> {
    return this.patch(id, { status: "failed", error, updatedAt: at });
  }

  async getById(id: string): Promise<GameRecord | null> {
    const found = this.records.get(id);
    return found ? { ...found } : null;
  }

  async listRecent(limit: number): Promise<GameRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  private patch(id: string, changes: Partial<GameRecord>): GameRecord | null {
    const existing = this.records.get(id);
    if (!existing) return null;
    const updated = { ...existing, ...changes };
    this.records.set(id, updated);
    return { ...updated };
  }
}
