// packages/core/src/index.ts
export { handleTurn } from "./handleTurn";
export { runDialogue, isExitCommand, type RunDialogueOptions } from "./dialogue";
export { EXIT_KEYWORDS } from "./config";
export { BOT_PREFIX, GOODBYE, LLM_FALLBACK, READY_BANNER, USER_PROMPT } from "./messages";
export type { DialogueIO, DialoguePhase, HandleTurnInput, HandleTurnOutput } from "./types";
