import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { runDialogue, type DialogueIO } from "@policy-qa/core";
import { buildRecordStore } from "@policy-qa/records";
import { ConversationState } from "@policy-qa/memory";
import type { ChatModel } from "@policy-qa/llm";
import { createConsoleIO } from "./console";

describe("createConsoleIO", () => {
  it("reads one line per prompt and writes the prompt first", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const io = createConsoleIO(input, output);

    const line = io.read("[You]: ");
    input.write("What is the premium for policy POL001?\n");

    await expect(line).resolves.toBe("What is the premium for policy POL001?");
    expect(String(output.read())).toBe("[You]: ");
    io.close();
  });

  it("keeps lines that arrive before they are read", async () => {
    const input = new PassThrough();
    const io = createConsoleIO(input, new PassThrough());

    input.end("q1 POL001\nq2\nq3\nexit\n");

    expect(await io.read("> ")).toBe("q1 POL001");
    expect(await io.read("> ")).toBe("q2");
    expect(await io.read("> ")).toBe("q3");
    expect(await io.read("> ")).toBe("exit");
    expect(await io.read("> ")).toBeNull();
  });

  it("resolves null once input ends", async () => {
    const input = new PassThrough();
    const io = createConsoleIO(input, new PassThrough());

    const line = io.read("[You]: ");
    input.end();

    await expect(line).resolves.toBeNull();
    await expect(io.read("[You]: ")).resolves.toBeNull();
  });

  it("writes whole lines", () => {
    const output = new PassThrough();
    const io = createConsoleIO(new PassThrough(), output);

    io.write("[Chatbot]: Goodbye!");
    io.close();

    expect(String(output.read())).toBe("[Chatbot]: Goodbye!\n");
  });

  it("answers every piped query while the model is slow", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const input = new PassThrough();
    const io: DialogueIO = createConsoleIO(input, new PassThrough());
    const seen: string[] = [];
    const llm: ChatModel = {
      async rewriteQuery({ user }) {
        return user;
      },
      async generateAnswer({ user }) {
        seen.push(user);
        await new Promise((r) => setTimeout(r, 5));
        return { content: "ok", model: "fake-model" };
      },
    };
    const store = buildRecordStore([{ policy_id: "POL001", premium: "200" }], "test.csv");

    const run = runDialogue({ io, state: new ConversationState(), store, llm });
    input.end("q1 POL001\nq2\nq3\nexit\n");

    await expect(run).resolves.toEqual({ turns: 3 });
    expect(seen).toEqual(["q1 POL001", "q2", "q3"]);
    vi.restoreAllMocks();
  });
});
