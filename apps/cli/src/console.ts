// apps/cli/src/console.ts
import * as readline from "node:readline";
import type { DialogueIO } from "@policy-qa/core";

export type ConsoleIO = DialogueIO & { close(): void };

/**
 * Console line reader over one readline iterator, so lines that arrive while
 * a turn is running stay queued. `read` resolves null once input ends.
 */
export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsoleIO {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  let ended = false;

  return {
    async read(prompt) {
      if (ended) return null;
      output.write(prompt);
      const next = await lines.next();
      if (next.done) {
        ended = true;
        return null;
      }
      return next.value;
    },
    write(line) {
      output.write(`${line}\n`);
    },
    close() {
      rl.close();
    },
  };
}
