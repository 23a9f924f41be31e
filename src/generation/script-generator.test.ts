import { describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

import { InvalidPromptError, ScriptGenerationError } from "./errors.js";
import type { TextModel } from "./gemini-provider.js";
import { SCRIPT_INSTRUCTIONS } from "./prompts.js";
import { deriveGameName, extractScript, MAX_PROMPT_LENGTH, ScriptGenerator } from "./script-generator.js";

function fakeModel(reply: string | Error) {
  const generateText = vi.fn(async (_prompt: string): Promise<string> => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const model: TextModel = { model: "gemini-test", generateText };
  return Object.assign(model, { generateText });
}

describe("extractScript", () => {
  it("returns the body of the first fenced block", () => {
    const reply = "Here you go:\n```gdscript\nextends Node2D\nfunc _ready():\n\tpass\n```\nEnjoy!";
    expect(extractScript(reply)).toBe("extends Node2D\nfunc _ready():\n\tpass");
  });

  it("accepts a fence without a language tag", () => {
    expect(extractScript("```\nextends Node\n```")).toBe("extends Node");
  });

  it("only takes the first of several blocks", () => {
    expect(extractScript("```gdscript\nfirst\n```\n```gdscript\nsecond\n```")).toBe("first");
  });

  it("falls back to the whole trimmed reply when there is no fence", () => {
    expect(extractScript("  extends Node2D  \n")).toBe("extends Node2D");
  });
});

describe("deriveGameName", () => {
  it("lowercases and joins words with underscores", () => {
    expect(deriveGameName("Blue Circle Fast")).toBe("blue_circle_fast");
  });

  it("strips punctuation and caps the length at 25", () => {
    expect(deriveGameName("A very, very long prompt about dragons!")).toBe("a_very_very_long_prompt_a");
  });

  it("collapses runs of whitespace", () => {
    expect(deriveGameName("  space \t shooter ")).toBe("space_shooter");
  });

  it("falls back to 'game' when nothing survives", () => {
    expect(deriveGameName("!!!")).toBe("game");
  });
});

describe("ScriptGenerator", () => {
  it("rejects an empty prompt", async () => {
    const gen = new ScriptGenerator(null);
    await expect(gen.generate("   ")).rejects.toBeInstanceOf(InvalidPromptError);
  });

  it("rejects an over-long prompt", async () => {
    const gen = new ScriptGenerator(null);
    await expect(gen.generate("x".repeat(MAX_PROMPT_LENGTH + 1))).rejects.toThrow(
      `Prompt must be at most ${MAX_PROMPT_LENGTH} characters`,
    );
  });

  it("uses the placeholder script when no model is configured", async () => {
    const gen = new ScriptGenerator(null);
    const result = await gen.generate("  Red Square  ");
    expect(result.source).toBe("placeholder");
    expect(result.prompt).toBe("Red Square");
    expect(result.name).toBe("red_square");
    expect(result.model).toBeUndefined();
    expect(result.script.split("\n")[0]).toBe("extends Node2D");
    expect(result.script).toContain('\tlabel.text = "Red Square"');
  });

  it("sends the composed prompt to the model and extracts the script", async () => {
    const model = fakeModel("```gdscript\nextends Node2D\n```");
    const gen = new ScriptGenerator(model);

    const result = await gen.generate("maze runner");

    expect(result).toEqual({
      prompt: "maze runner",
      name: "maze_runner",
      script: "extends Node2D",
      source: "gemini",
      model: "gemini-test",
    });
    expect(model.generateText).toHaveBeenCalledWith(`${SCRIPT_INSTRUCTIONS}\n\nPlayer idea: maze runner\n\nScript:`);
  });

  it("wraps model failures in ScriptGenerationError", async () => {
    const gen = new ScriptGenerator(fakeModel(new Error("quota exceeded")));
    const err = await gen.generate("pong").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ScriptGenerationError);
    expect((err as ScriptGenerationError).message).toBe("Script generation failed: quota exceeded");
    expect((err as ScriptGenerationError).httpStatus).toBe(502);
  });

  it("rejects an empty model reply", async () => {
    const gen = new ScriptGenerator(fakeModel("```gdscript\n\n```"));
    await expect(gen.generate("pong")).rejects.toThrow("Model returned an empty script");
  });
});
