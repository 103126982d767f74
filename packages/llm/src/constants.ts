import * as dotenv from "dotenv";
dotenv.config();

const int = (v: string | undefined, def: number) => {
  const n = parseInt(v ?? "", 10);
  return Number.isFinite(n) ? n : def;
};
const float = (v: string | undefined, def: number) => {
  const n = parseFloat(v ?? "");
  return Number.isFinite(n) ? n : def;
};

export const CHAT_MODEL = process.env.CHAT_MODEL || "gpt-4o-mini";
export const LLM_TEMPERATURE = float(process.env.LLM_TEMPERATURE, 0);
export const LLM_MAX_TOKENS = int(process.env.LLM_MAX_TOKENS, 600);

// Per attempt; a failed or timed-out call is retried LLM_RETRIES times
export const LLM_TIMEOUT_MS = int(process.env.LLM_TIMEOUT_MS, 20000);
export const LLM_RETRIES = Math.max(0, int(process.env.LLM_RETRIES, 1));

export const LLM_VERBOSE = process.env.CORE_VERBOSE === "1" || process.env.LLM_VERBOSE === "1";
