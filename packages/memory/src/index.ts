// packages/memory/src/index.ts
export { ConversationState } from "./conversation";
export type { Message, Role, TurnItem } from "./types";
