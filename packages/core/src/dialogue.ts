// packages/core/src/dialogue.ts
import type { ConversationState } from "../../memory/src";
import type { RecordStore } from "../../records/src";
import type { ChatModel } from "../../llm/src";
import { CORE_VERBOSE, EXIT_KEYWORDS } from "./config";
import { handleTurn } from "./handleTurn";
import { BOT_PREFIX, GOODBYE, USER_PROMPT } from "./messages";
import type { DialogueIO, DialoguePhase } from "./types";

export type RunDialogueOptions = {
  io: DialogueIO;
  state: ConversationState;
  store: RecordStore;
  llm: ChatModel;
  onPhase?: (phase: DialoguePhase) => void;
};

export function isExitCommand(input: string, keywords: readonly string[] = EXIT_KEYWORDS): boolean {
  return keywords.includes(input.trim().toLowerCase());
}

/**
 * AwaitingInput → Rewriting → Resolving → Generating → Responding → AwaitingInput,
 * until an exit keyword (or end of input) moves it to Closed.
 * Turns never overlap: the next line is read only after the answer is printed.
 */
export async function runDialogue(opts: RunDialogueOptions): Promise<{ turns: number }> {
  const { io, state, store, llm, onPhase } = opts;

  const enter = (phase: DialoguePhase) => {
    if (CORE_VERBOSE) console.log("[core] phase →", phase);
    onPhase?.(phase);
  };

  for (;;) {
    enter("AwaitingInput");
    const line = await io.read(USER_PROMPT);

    if (line === null || isExitCommand(line)) {
      io.write(GOODBYE);
      enter("Closed");
      return { turns: state.turnCount };
    }

    const out = await handleTurn({ message: line, state, store, llm, onPhase: enter });

    enter("Responding");
    io.write(`${BOT_PREFIX}${out.content}`);
  }
}
