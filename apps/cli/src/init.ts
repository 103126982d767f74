// apps/cli/src/init.ts
import { loadRecordStore, POLICY_CSV_PATH, type RecordStore } from "@policy-qa/records";
import { assertVectorIndexReady, INDEX_NAME } from "@policy-qa/retriever";
import {
  CHAT_MODEL,
  createChatModel,
  createOpenAIClient,
  type ChatModel,
  type CompletionsClient,
} from "@policy-qa/llm";
import { ConversationState } from "@policy-qa/memory";

const bool = (v: string | undefined, def = false) =>
  v == null ? def : ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());

export const VECTOR_INDEX_REQUIRED = bool(process.env.VECTOR_INDEX_REQUIRED, true);

export type InitOptions = {
  csvPath?: string;
  requireVectorIndex?: boolean;
  /** defaults to FT.INFO against Redis */
  indexSize?: () => Promise<number | null>;
  /** defaults to the OpenAI client */
  client?: CompletionsClient;
  systemPrompt?: string;
};

export type Assistant = {
  store: RecordStore;
  llm: ChatModel;
  state: ConversationState;
};

/**
 * Startup: record store, vector index presence, chat model.
 * Any failure here is fatal for the caller; nothing is retried.
 */
export async function initAssistant(opts: InitOptions = {}): Promise<Assistant> {
  console.log("--- Initializing Insurance Chatbot System Components ---");

  // 1) Policy lookup map
  const store = loadRecordStore(opts.csvPath ?? POLICY_CSV_PATH);

  // 2) Persisted vector index
  if (opts.requireVectorIndex ?? VECTOR_INDEX_REQUIRED) {
    const size = await assertVectorIndexReady(opts.indexSize);
    console.log(`[cli] Vector store '${INDEX_NAME}' loaded (${size} documents).`);
  } else {
    console.log("[cli] Vector index check skipped.");
  }

  // 3) LLM
  const llm = createChatModel(opts.client ?? createOpenAIClient(), { systemPrompt: opts.systemPrompt });
  console.log(`[cli] LLM '${CHAT_MODEL}' initialized.`);

  return { store, llm, state: new ConversationState() };
}
