export const SCRIPT_INSTRUCTIONS = [
  "You are a game programmer writing for the Godot 4 engine.",
  "Turn the player's idea into ONE self-contained GDScript file for a small, playable 2D game.",
  "Constraints:",
  "- The script must `extends Node2D` and build every node it needs in `_ready()` (no external scenes or assets).",
  "- Use only built-in shapes (ColorRect, Polygon2D, Label) for visuals.",
  "- Keyboard input through the default ui_* actions only.",
  "- Keep it under 200 lines and free of editor-only APIs.",
  "- No real-world IP names, trademarks or offensive content.",
  "Output: return only the script inside a single ```gdscript fenced block.",
].join("\n");

/** Compose the full model prompt for a user idea. */
export function buildScriptPrompt(idea: string): string {
  return `${SCRIPT_INSTRUCTIONS}\n\nPlayer idea: ${idea}\n\nScript:`;
}
