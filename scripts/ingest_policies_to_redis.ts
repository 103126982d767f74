// scripts/ingest_policies_to_redis.ts
// One-off ingestion CSV -> Redis: recreates the vector index and embeds every policy document.
import * as dotenv from "dotenv";
import { parsePolicyFields, POLICY_CSV_PATH, readPolicyRows, serializeRow } from "@policy-qa/records";
import {
  closeRedis,
  embedText,
  EMBEDDING_DIM,
  ensureVectorIndex,
  getVectorIndexSize,
  indexPolicyDocument,
  INDEX_NAME,
} from "@policy-qa/retriever";

dotenv.config();

async function main() {
  if (!process.env.OPENAI_API_KEY) {
    throw new Error("Missing env: OPENAI_API_KEY");
  }

  console.log("====================================================");
  console.log("Policy ingestion CSV -> Redis");
  console.log("====================================================");
  console.log(`[cfg] csv:   ${POLICY_CSV_PATH}`);
  console.log(`[cfg] index: ${INDEX_NAME} (DIM=${EMBEDDING_DIM})`);
  console.log("----------------------------------------------------");

  const rows = readPolicyRows(POLICY_CSV_PATH);
  console.log(`[csv] rows found: ${rows.length}`);
  if (!rows.length) {
    console.log("[csv] nothing to index. Exiting.");
    return;
  }

  await ensureVectorIndex();

  let ok = 0;
  let fail = 0;
  for (const [i, row] of rows.entries()) {
    const label = `row=${i}`;
    const content = serializeRow(row);
    const fields = parsePolicyFields(row);
    if (!fields) {
      console.warn(`[row] ${label} has invalid policy fields, indexing text only`);
    }

    try {
      const embedding = await embedText(content);
      if (embedding.length !== EMBEDDING_DIM) {
        console.warn(`[row] ${label} embedding dims ${embedding.length} (expected ${EMBEDDING_DIM})`);
      }
      await indexPolicyDocument(String(i), {
        policy_id: fields?.policy_id ?? "",
        content,
        coverage_amount: fields?.coverage_amount ?? null,
        premium: fields?.premium ?? null,
        renewal_date: fields?.renewal_date ?? "",
        embedding,
      });
      console.log(`[row] ${label} ${fields?.policy_id ?? "(no id)"} indexed`);
      ok++;
    } catch (e) {
      fail++;
      console.error(`[row] error in ${label}:`, e instanceof Error ? e.message : e);
    }
  }

  console.log("\n====================================================");
  console.log(`indexed OK: ${ok}`);
  console.log(`failed:     ${fail}`);
  console.log(`[redis] num_docs: ${(await getVectorIndexSize()) ?? "unknown"}`);
  console.log("====================================================");
}

main()
  .catch((e) => {
    console.error("Ingestion failed:", e);
    process.exitCode = 1;
  })
  .finally(() => closeRedis());
