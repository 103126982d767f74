import * as dotenv from "dotenv";
dotenv.config();

export const REDIS_URL = process.env.REDIS_URL || "redis://localhost:6379";
// Reconnect attempts before a connect (or a dropped connection) gives up
export const REDIS_CONNECT_RETRIES = Math.max(0, parseInt(process.env.REDIS_CONNECT_RETRIES ?? "", 10) || 3);
export const INDEX_NAME = process.env.REDIS_VECTOR_INDEX || "policy_idx";
export const KEY_PREFIX = process.env.REDIS_KEY_PREFIX || "policy:";
export const VECTOR_FIELD = "embedding";

export const EMBEDDING_MODEL = process.env.EMBEDDING_MODEL || "text-embedding-3-small";
export const EMBEDDING_DIM = 1536; // text-embedding-3-small

/** Retrieval decisions are printed unless RETRIEVER_VERBOSE=0 */
export const RETRIEVER_VERBOSE = (process.env.RETRIEVER_VERBOSE ?? "1") !== "0";
