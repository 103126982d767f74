import { describe, expect, it } from "vitest";
import { buildAnswerMessages, buildRewriteMessages, REWRITE_INSTRUCTION } from "./prompt";
import type { Message } from "../../memory/src";

const history: Message[] = [
  { role: "user", content: "What is the premium for POL001?" },
  { role: "assistant", content: "The premium for POL001 is 500." },
];

describe("buildRewriteMessages", () => {
  it("puts the utterance and then the instruction after the history", () => {
    expect(buildRewriteMessages({ history, user: "and its renewal date?" })).toEqual([
      ...history,
      { role: "user", content: "and its renewal date?" },
      { role: "user", content: REWRITE_INSTRUCTION },
    ]);
  });
});

describe("buildAnswerMessages", () => {
  it("starts with the system prompt and ends with the user turn", () => {
    const msgs = buildAnswerMessages({ system: "SYS", history, user: "thanks" });

    expect(msgs).toEqual([{ role: "system", content: "SYS" }, ...history, { role: "user", content: "thanks" }]);
  });
});
