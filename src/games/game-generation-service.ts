import { randomUUID } from "node:crypto";
import type { AutomationClient } from "../automation/automation-client.js";
import { logger } from "../config/logger.js";
import type { ScriptGenerator } from "../generation/script-generator.js";
import type { BuildArtifacts, GameRecord, IGameRepository } from "./repository-types.js";

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

/**
 * Script as submitted for building. Automation endpoints key builds on the
 * script's opening characters, so the record id leads.
 */
export function tagScript(id: string, script: string): string {
  return `# ${id}\n${script}`;
}

export interface GameGenerationDeps {
  generator: Pick<ScriptGenerator, "generate">;
  automation: Pick<AutomationClient, "build">;
  repo: IGameRepository;
  now?: () => number;
  newId?: () => string;
}

/**
 * Prompt → script → automation build → stored record.
 *
 * A record exists from the moment a script is produced; it ends up "ready"
 * with both URLs or "failed" with the automation error.
 */
export class GameGenerationService {
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(private readonly deps: GameGenerationDeps) {
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? randomUUID;
  }

  async generate(prompt: string): Promise<GameRecord> {
    const generated = await this.deps.generator.generate(prompt);

    const record = await this.deps.repo.insert({
      id: this.newId(),
      prompt: generated.prompt,
      name: generated.name,
      script: generated.script,
      scriptSource: generated.source,
      model: generated.model ?? null,
      createdAt: this.now(),
    });

    let artifacts: BuildArtifacts;
    try {
      artifacts = await this.deps.automation.build(tagScript(record.id, generated.script));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error("Game build failed", { id: record.id, error: msg });
      try {
        await this.deps.repo.markFailed(record.id, msg, this.now());
      } catch (markErr) {
        logger.error("Could not record build failure", {
          id: record.id,
          error: markErr instanceof Error ? markErr.message : String(markErr),
        });
      }
      throw err;
    }

    const ready = await this.deps.repo.markReady(record.id, artifacts, this.now());
    logger.info("Game build ready", { id: record.id, name: record.name, source: record.scriptSource });
    return ready ?? { ...record, status: "ready", webglUrl: artifacts.webglUrl, apkUrl: artifacts.apkUrl };
  }

  async get(id: string): Promise<GameRecord | null> {
    return this.deps.repo.getById(id);
  }

  async listRecent(limit: number = DEFAULT_LIST_LIMIT): Promise<GameRecord[]> {
    const clamped = Number.isFinite(limit) ? Math.min(Math.max(Math.trunc(limit), 1), MAX_LIST_LIMIT) : DEFAULT_LIST_LIMIT;
    return this.deps.repo.listRecent(clamped);
  }
}
