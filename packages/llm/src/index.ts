// packages/llm/src/index.ts
import OpenAI from "openai";
import { buildAnswerMessages, buildRewriteMessages } from "./prompt";
import { loadSystemPrompt, renderSystemPrompt } from "./system";
import { withRetry, withTimeout } from "./retry";
import {
  CHAT_MODEL,
  LLM_MAX_TOKENS,
  LLM_RETRIES,
  LLM_TEMPERATURE,
  LLM_TIMEOUT_MS,
  LLM_VERBOSE,
} from "./constants";
import type { ChatMessage, ChatModel, CompletionsClient } from "./types";

export { loadSystemPrompt, renderSystemPrompt } from "./system";
export { buildAnswerMessages, buildRewriteMessages, REWRITE_INSTRUCTION } from "./prompt";
export { withRetry, withTimeout } from "./retry";
export { ANSWER_TEMPLATES, type AnswerTemplate } from "./templates";
export { CHAT_MODEL } from "./constants";
export type {
  AnswerInput,
  AnswerOutput,
  ChatMessage,
  ChatModel,
  CompletionRequest,
  CompletionsClient,
  RewriteInput,
} from "./types";

function dbg(...args: unknown[]) {
  if (LLM_VERBOSE) console.log("[llm]", ...args);
}

/* =========================
   OpenAI client
========================= */
/** Retries and timeouts belong to `withRetry`/`withTimeout`; the SDK adds none of its own. */
export function openAIClientOptions(apiKey: string) {
  return { apiKey, maxRetries: 0, timeout: LLM_TIMEOUT_MS };
}

export function createOpenAIClient(apiKey = process.env.OPENAI_API_KEY): CompletionsClient {
  if (!apiKey) throw new Error("OPENAI_API_KEY not set");
  const openai = new OpenAI(openAIClientOptions(apiKey));

  return {
    async complete(req) {
      const res = await openai.chat.completions.create({
        model: req.model,
        messages: req.messages,
        temperature: req.temperature,
        max_tokens: req.max_tokens,
      });
      return res.choices[0]?.message?.content ?? "";
    },
  };
}

/* =========================
   Chat model
========================= */
export function createChatModel(
  client: CompletionsClient,
  opts: { systemPrompt?: string } = {}
): ChatModel {
  const systemTemplate = opts.systemPrompt ?? loadSystemPrompt();

  const call = (messages: ChatMessage[], label: string) =>
    withRetry(
      () =>
        withTimeout(
          client.complete({
            model: CHAT_MODEL,
            messages,
            temperature: LLM_TEMPERATURE,
            max_tokens: LLM_MAX_TOKENS,
          }),
          LLM_TIMEOUT_MS,
          label
        ),
      LLM_RETRIES,
      label
    );

  return {
    async rewriteQuery({ history, user }) {
      // first turn: nothing to resolve against, the utterance is already standalone
      if (!history.length) return user;

      const out = (await call(buildRewriteMessages({ history, user }), "llm:rewrite")).trim();
      dbg("rewrite:", JSON.stringify(user), "→", JSON.stringify(out));
      return out || user;
    },

    async generateAnswer({ context, history, user }) {
      const system = renderSystemPrompt(systemTemplate, context);
      const messages = buildAnswerMessages({ system, history, user });
      dbg("model:", CHAT_MODEL, "| history msgs:", history.length, "| context chars:", context.length);

      const content = (await call(messages, "llm:answer")).trim();
      return { content, model: CHAT_MODEL };
    },
  };
}
