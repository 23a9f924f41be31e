/**
 * Deterministic stand-in script used when no model is configured.
 * A coloured square the player steers with the arrow keys, titled with the prompt.
 */
export function placeholderScript(prompt: string): string {
  const title = JSON.stringify(prompt);
  return [
    "extends Node2D",
    "",
    "const SPEED := 240.0",
    "var player: ColorRect",
    "",
    "func _ready() -> void:",
    "\tvar label := Label.new()",
    `\tlabel.text = ${title}`,
    "\tlabel.position = Vector2(16, 16)",
    "\tadd_child(label)",
    "\tplayer = ColorRect.new()",
    "\tplayer.color = Color(0.9, 0.2, 0.2)",
    "\tplayer.size = Vector2(48, 48)",
    "\tplayer.position = Vector2(300, 200)",
    "\tadd_child(player)",
    "",
    "func _process(delta: float) -> void:",
    '\tvar dir := Input.get_vector("ui_left", "ui_right", "ui_up", "ui_down")',
    "\tplayer.position += dir * SPEED * delta",
    "",
  ].join("\n");
}
