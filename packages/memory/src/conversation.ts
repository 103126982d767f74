// packages/memory/src/conversation.ts
import type { Message, TurnItem } from "./types";

/**
 * Transcript of one session, in chronological order.
 * Only grows: every turn adds the user message then the assistant answer.
 * Lives as long as the process; nothing is trimmed or persisted.
 */
export class ConversationState {
  private readonly turns: TurnItem[] = [];

  appendTurn(userMsg: string, assistantMsg: string) {
    this.turns.push({ user: userMsg, assistant: assistantMsg });
  }

  /** Snapshot as chat messages, ready for the LLM */
  get messages(): readonly Message[] {
    const out: Message[] = [];
    for (const t of this.turns) {
      out.push({ role: "user", content: t.user });
      out.push({ role: "assistant", content: t.assistant });
    }
    return out;
  }

  get turnCount(): number {
    return this.turns.length;
  }

  get isEmpty(): boolean {
    return this.turns.length === 0;
  }
}
