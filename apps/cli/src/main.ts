// apps/cli/src/main.ts
// env from the working directory's .env, before any package reads it
import "dotenv/config";

import { READY_BANNER, runDialogue } from "@policy-qa/core";
import { closeRedis } from "@policy-qa/retriever";
import { createConsoleIO } from "./console";
import { initAssistant } from "./init";

async function main() {
  const { store, llm, state } = await initAssistant();

  for (const line of READY_BANNER) console.log(line);

  const io = createConsoleIO();
  try {
    const { turns } = await runDialogue({ io, state, store, llm });
    console.log(`[cli] session closed after ${turns} turn(s)`);
  } finally {
    io.close();
    await closeRedis();
  }
}

main().catch((err: unknown) => {
  console.error("[cli] Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
