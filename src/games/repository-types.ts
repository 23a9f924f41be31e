// src/games/repository-types.ts
//
// Plain TypeScript interfaces for generated-game records.
// No Drizzle types. These are the contract the service works against.

export type GameStatus = "pending" | "ready" | "failed";

export type ScriptSource = "gemini" | "placeholder";

export interface GameRecord {
  id: string;
  prompt: string;
  name: string;
  script: string;
  scriptSource: ScriptSource;
  model: string | null;
  status: GameStatus;
  webglUrl: string | null;
  apkUrl: string | null;
  error: string | null;
  /** Unix epoch ms */
  createdAt: number;
  /** Unix epoch ms */
  updatedAt: number;
}

export interface NewGameRecord {
  id: string;
  prompt: string;
  name: string;
  script: string;
  scriptSource: ScriptSource;
  model: string | null;
  createdAt: number;
}

export interface BuildArtifacts {
  webglUrl: string;
  apkUrl: string;
}

export interface IGameRepository {
  /** Store a new record in the "pending" state. */
  insert(record: NewGameRecord): Promise<GameRecord>;
  markReady(id: string, artifacts: BuildArtifacts, at: number): Promise<GameRecord | null>;
  markFailed(id: string, error: string, at: number): Promise<GameRecord | null>;
  getById(id: string): Promise<GameRecord | null>;
  /** Newest first. */
  listRecent(limit: number): Promise<GameRecord[]>;
}
