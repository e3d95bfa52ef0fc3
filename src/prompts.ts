import fs from "node:fs";
import path from "node:path";

function loadPrompt(name: string) {
  const file = path.resolve(__dirname, "..", "prompts", `${name}.md`);
  return fs.readFileSync(file, "utf8");
}

export const prompts = {
  confidence: loadPrompt("confidence"),
  strategyHint: loadPrompt("strategy-hint"),
  analyze: loadPrompt("analyze"),
};

/** Fills `{{name}}` placeholders; unknown placeholders are left untouched. */
export function renderPrompt(template: string, values: Record<string, string>) {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}
