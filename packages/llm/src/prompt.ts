// packages/llm/src/prompt.ts
import type { Message } from "../../memory/src";
import type { ChatMessage } from "./types";

export const REWRITE_INSTRUCTION =
  "Given the above conversation, generate a concise standalone search query for the retriever, considering the chat history if necessary. Only return the search query itself, no other text.";

/** history, the new utterance, then the rewrite instruction */
export function buildRewriteMessages(opts: { history: readonly Message[]; user: string }): ChatMessage[] {
  return [
    ...opts.history.map((m) => ({ ...m })),
    { role: "user", content: opts.user },
    { role: "user", content: REWRITE_INSTRUCTION },
  ];
}

export function buildAnswerMessages(opts: {
  system: string;
  history: readonly Message[];
  user: string;
}): ChatMessage[] {
  const msgs: ChatMessage[] = [{ role: "system", content: opts.system }];
  for (const m of opts.history) msgs.push({ ...m });
  msgs.push({ role: "user", content: opts.user });
  return msgs;
}
