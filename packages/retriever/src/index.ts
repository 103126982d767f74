// packages/retriever/src/index.ts
export { classifyQuery, POLICY_ID_RX } from "./classify";
export { resolveContext, renderContext, type Resolution, type ResolutionReason } from "./resolve";
export {
  assertVectorIndexReady,
  getVectorIndexSize,
  ensureVectorIndex,
  indexPolicyDocument,
  searchSimilarPolicies,
  parseInfoReply,
  parseSearchReply,
  type SimilarPolicy,
  type IndexedPolicy,
} from "./vector";
export { embedText } from "./embeddings";
export { getRedis, closeRedis, reconnectStrategy } from "./redisClient";
export { INDEX_NAME, EMBEDDING_DIM } from "./constants";
