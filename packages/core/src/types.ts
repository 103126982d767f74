import type { ConversationState } from "../../memory/src";
import type { RecordStore } from "../../records/src";
import type { ResolutionReason } from "../../retriever/src";
import type { ChatModel } from "../../llm/src";

export type DialoguePhase =
  | "AwaitingInput"
  | "Rewriting"
  | "Resolving"
  | "Generating"
  | "Responding"
  | "Closed";

export type HandleTurnInput = {
  message: string;
  state: ConversationState;
  store: RecordStore;
  llm: ChatModel;
  onPhase?: (phase: DialoguePhase) => void;
};

export type HandleTurnOutput = {
  content: string;
  model: string;
  /** what the classifier actually looked at */
  standaloneQuery: string;
  policyId: string | null;
  reason: ResolutionReason;
  /** true when the answer is the fixed apology */
  fallback: boolean;
};

/** Line-oriented console; `read` resolves null at end of input */
export interface DialogueIO {
  read(prompt: string): Promise<string | null>;
  write(line: string): void;
}
