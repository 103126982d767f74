// packages/retriever/src/resolve.ts
import type { PolicyDocument, PolicyRecord, RecordStore } from "../../records/src";
import { classifyQuery } from "./classify";
import { RETRIEVER_VERBOSE } from "./constants";

export type ResolutionReason = "matched" | "no_policy_id" | "not_found";

export type Resolution = {
  /** zero or one record */
  docs: PolicyRecord[];
  policyId: string | null;
  reason: ResolutionReason;
};

function log(line: string) {
  if (RETRIEVER_VERBOSE) console.log(`[retrieval] ${line}`);
}

/**
 * Exact-id lookup only. A query without an id, or with an id the store does
 * not know, gets no context; the vector index is never consulted here.
 */
export function resolveContext(query: string, store: RecordStore): Resolution {
  const policyId = classifyQuery(query);

  if (!policyId) {
    log("No specific policy ID found in query. No document retrieval from vectorstore.");
    return { docs: [], policyId: null, reason: "no_policy_id" };
  }

  const record = store.byId.get(policyId);
  if (!record) {
    log(`Policy ID '${policyId}' not found. No document retrieval from vectorstore.`);
    return { docs: [], policyId, reason: "not_found" };
  }

  log(`Directly retrieved policy: ${policyId}`);
  return { docs: [record], policyId, reason: "matched" };
}

/** Text handed to the answer step: documents separated by a blank line, "" when empty. */
export function renderContext(docs: readonly PolicyDocument[]): string {
  return docs.map((d) => d.content).join("\n\n");
}
