// packages/retriever/src/vector.ts
// RediSearch vector index over the policy documents. The chat path only checks
// that the index exists; similarity search is reachable from scripts alone.
import { getRedis } from "./redisClient";
import { embedText, toFloat32Blob } from "./embeddings";
import { INDEX_NAME, KEY_PREFIX, VECTOR_FIELD, EMBEDDING_DIM } from "./constants";

export type SimilarPolicy = {
  id: string;
  policy_id: string;
  content: string;
  score: number;
};

export type IndexedPolicy = {
  policy_id: string;
  content: string;
  coverage_amount: number | null;
  premium: number | null;
  renewal_date: string;
  embedding: number[];
};

/* =========================
   Reply parsing
========================= */

/** FT.INFO answers with a flat [name, value, name, value…] list. */
export function parseInfoReply(reply: unknown): number | null {
  if (!Array.isArray(reply)) return null;
  for (let i = 0; i < reply.length - 1; i += 2) {
    if (String(reply[i]) === "num_docs") {
      const n = Number(String(reply[i + 1]));
      return Number.isFinite(n) ? n : null;
    }
  }
  return null;
}

/** FT.SEARCH answers with [total, key, [field, value…], key, [field, value…]…]. */
export function parseSearchReply(reply: unknown): SimilarPolicy[] {
  const out: SimilarPolicy[] = [];
  if (!Array.isArray(reply) || reply.length < 2) return out;

  for (let i = 1; i < reply.length; i += 2) {
    const key = String(reply[i]);
    const arr: unknown = reply[i + 1];
    const fields: Record<string, string> = {};
    if (Array.isArray(arr)) {
      for (let j = 0; j < arr.length - 1; j += 2) fields[String(arr[j])] = String(arr[j + 1]);
    }

    out.push({
      id: key.startsWith(KEY_PREFIX) ? key.slice(KEY_PREFIX.length) : key,
      policy_id: fields["policy_id"] ?? "",
      content: fields["content"] ?? "",
      score: Number(fields["__score"] ?? "0"),
    });
  }
  return out;
}

function isUnknownIndex(e: unknown) {
  const msg = e instanceof Error ? e.message : String(e);
  return /unknown index|no such index/i.test(msg);
}

/* =========================
   Index state
========================= */

/** Number of indexed documents, or null when the index does not exist. */
export async function getVectorIndexSize(): Promise<number | null> {
  const redis = await getRedis();
  try {
    return parseInfoReply(await redis.sendCommand(["FT.INFO", INDEX_NAME]));
  } catch (e) {
    if (isUnknownIndex(e)) return null;
    throw e;
  }
}

export async function assertVectorIndexReady(
  sizeOf: () => Promise<number | null> = getVectorIndexSize
): Promise<number> {
  const size = await sizeOf();
  if (!size) {
    throw new Error(`Vector store not found at index '${INDEX_NAME}'. Run the ingest script once to create it.`);
  }
  return size;
}

/* =========================
   Ingestion
========================= */

/** Drops any previous index (with its documents) and creates an empty one. */
export async function ensureVectorIndex(dim = EMBEDDING_DIM) {
  const redis = await getRedis();
  try {
    await redis.sendCommand(["FT.DROPINDEX", INDEX_NAME, "DD"]);
    console.log(`[redis] previous index '${INDEX_NAME}' dropped`);
  } catch (e) {
    if (!isUnknownIndex(e)) throw e;
    console.log(`[redis] no previous index '${INDEX_NAME}'`);
  }

  await redis.sendCommand([
    "FT.CREATE", INDEX_NAME,
    "ON", "JSON",
    "PREFIX", "1", KEY_PREFIX,
    "SCHEMA",
    "$.policy_id", "AS", "policy_id", "TAG",
    "$.content", "AS", "content", "TEXT",
    "$.coverage_amount", "AS", "coverage_amount", "NUMERIC",
    "$.premium", "AS", "premium", "NUMERIC",
    "$.renewal_date", "AS", "renewal_date", "TEXT",
    `$.${VECTOR_FIELD}`, "AS", VECTOR_FIELD, "VECTOR", "FLAT", "6",
    "TYPE", "FLOAT32",
    "DIM", String(dim),
    "DISTANCE_METRIC", "COSINE",
  ]);
  console.log(`[redis] index '${INDEX_NAME}' created`);
}

export async function indexPolicyDocument(id: string, doc: IndexedPolicy) {
  const redis = await getRedis();
  await redis.sendCommand(["JSON.SET", `${KEY_PREFIX}${id}`, "$", JSON.stringify(doc)]);
}

/* =========================
   Similarity search
========================= */

export async function searchSimilarPolicies(query: string, k = 4): Promise<SimilarPolicy[]> {
  const redis = await getRedis();
  const blob = toFloat32Blob(await embedText(query));

  const returnFields = ["policy_id", "content", "__score"];
  const raw = await redis.sendCommand([
    "FT.SEARCH",
    INDEX_NAME,
    `*=>[KNN $K @${VECTOR_FIELD} $BLOB AS __score]`,
    "PARAMS", "4",
    "K", String(k),
    "BLOB", blob,
    "RETURN", String(returnFields.length), ...returnFields,
    "SORTBY", "__score",
    "DIALECT", "2",
    "LIMIT", "0", String(k),
  ]);

  return parseSearchReply(raw);
}
