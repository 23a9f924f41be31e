import { logger } from "../config/logger.js";
import type { ScriptSource } from "../games/repository-types.js";
import { InvalidPromptError, ScriptGenerationError } from "./errors.js";
import type { TextModel } from "./gemini-provider.js";
import { placeholderScript } from "./placeholder-script.js";
import { buildScriptPrompt } from "./prompts.js";

export const MAX_PROMPT_LENGTH = 2000;
const MAX_NAME_LENGTH = 25;

export interface GeneratedScript {
  prompt: string;
  /** URL-safe slug, e.g. "space_shooter" */
  name: string;
  script: string;
  source: ScriptSource;
  /** Model name when source === "gemini" */
  model?: string;
}

const FENCED_BLOCK_RE = /```[\w-]*[^\S\n]*\n([\s\S]*?)```/;

/**
 * Pull the script out of a model reply. The first fenced block wins; a reply
 * with no fence is taken whole.
 */
export function extractScript(text: string): string {
  const match = text.match(FENCED_BLOCK_RE);
  return (match ? match[1] : text).trim();
}

export function deriveGameName(prompt: string): string {
  const slug = prompt
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_-]/g, "")
    .slice(0, MAX_NAME_LENGTH);
  return slug || "game";
}

export class ScriptGenerator {
  /** `model` null means no API key: every prompt gets the placeholder script. */
  constructor(private readonly model: TextModel | null) {}

  async generate(rawPrompt: string): Promise<GeneratedScript> {
    const prompt = rawPrompt.trim();
    if (!prompt) throw new InvalidPromptError("Prompt must be a non-empty string");
    if (prompt.length > MAX_PROMPT_LENGTH) {
      throw new InvalidPromptError(`Prompt must be at most ${MAX_PROMPT_LENGTH} characters`);
    }

    const name = deriveGameName(prompt);

    if (!this.model) {
      logger.info("No model configured, using placeholder script", { name });
      return { prompt, name, script: placeholderScript(prompt), source: "placeholder" };
    }

    let reply: string;
    try {
      reply = await this.model.generateText(buildScriptPrompt(prompt));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error("Script generation failed", { model: this.model.model, error: msg });
      throw new ScriptGenerationError(`Script generation failed: ${msg}`, { cause: err });
    }

    const script = extractScript(reply);
    if (!script) throw new ScriptGenerationError("Model returned an empty script");

    return { prompt, name, script, source: "gemini", model: this.model.model };
  }
}
