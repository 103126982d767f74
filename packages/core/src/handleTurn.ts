// packages/core/src/handleTurn.ts
import { resolveContext, renderContext } from "../../retriever/src";
import { CORE_VERBOSE } from "./config";
import { LLM_FALLBACK } from "./messages";
import type { HandleTurnInput, HandleTurnOutput } from "./types";

function dbg(...args: unknown[]) {
  if (CORE_VERBOSE) console.log("[core]", ...args);
}

const errMsg = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * One user turn: rewrite → resolve → generate, then the turn is appended to
 * the conversation. Only the rewritten query is classified.
 */
export async function handleTurn(input: HandleTurnInput): Promise<HandleTurnOutput> {
  const { message, state, store, llm, onPhase } = input;
  const history = state.messages;

  // 1) Standalone query (the raw utterance if the rewrite cannot be obtained)
  onPhase?.("Rewriting");
  let standaloneQuery = message;
  try {
    standaloneQuery = await llm.rewriteQuery({ history, user: message });
  } catch (e) {
    console.warn("[core] rewrite failed, using the raw utterance:", errMsg(e));
  }
  dbg(`standalone query: ${JSON.stringify(standaloneQuery)}`);

  // 2) Context: exact policy record or nothing
  onPhase?.("Resolving");
  const resolution = resolveContext(standaloneQuery, store);
  const context = renderContext(resolution.docs);
  dbg(`resolution: reason=${resolution.reason} policy=${resolution.policyId ?? "-"} docs=${resolution.docs.length}`);

  // 3) Answer
  onPhase?.("Generating");
  let content = "";
  let model = "fallback";
  try {
    const out = await llm.generateAnswer({ context, history, user: message });
    content = out.content;
    model = out.model;
  } catch (e) {
    console.warn("[core] llm error/fallback:", errMsg(e));
  }
  const fallback = !content;
  if (fallback) content = LLM_FALLBACK;
  dbg(`llm: model=${model} | content.len=${content.length}`);

  // 4) Conversation state
  state.appendTurn(message, content);

  return {
    content,
    model,
    standaloneQuery,
    policyId: resolution.policyId,
    reason: resolution.reason,
    fallback,
  };
}
