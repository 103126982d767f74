import type { Message } from "../../memory/src";

export type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

export type CompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
};

/** The one call this project makes to a chat-completions API. */
export interface CompletionsClient {
  complete(req: CompletionRequest): Promise<string>;
}

export type RewriteInput = {
  history: readonly Message[];
  user: string;
};

export type AnswerInput = {
  /** rendered policy records, "" when the resolver found nothing */
  context: string;
  history: readonly Message[];
  user: string;
};

export type AnswerOutput = {
  content: string;
  model: string;
};

export interface ChatModel {
  /** Standalone search query for the current utterance */
  rewriteQuery(input: RewriteInput): Promise<string>;
  generateAnswer(input: AnswerInput): Promise<AnswerOutput>;
}
