import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { ANSWER_TEMPLATES } from "./templates";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the system prompt template from:
 * 1) process.env.LLM_SYSTEM_PATH (when set)
 * 2) packages/llm/system.txt
 */
export function loadSystemPrompt(): string {
  const envPath = process.env.LLM_SYSTEM_PATH;
  const defaultPath = join(__dirname, "..", "system.txt");
  return readFileSync(envPath || defaultPath, "utf8");
}

/** Fills `{context}` and the `{TEMPLATE}` placeholders; unknown placeholders stay as written. */
export function renderSystemPrompt(template: string, context: string): string {
  const values: Record<string, string> = { ...ANSWER_TEMPLATES, context };
  return template.replace(/\{(\w+)\}/g, (m, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : m
  );
}
