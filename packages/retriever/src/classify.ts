// packages/retriever/src/classify.ts

/** POL followed by three digits, matched against the upper-cased query */
export const POLICY_ID_RX = /POL\d{3}/;

/**
 * Returns the first policy identifier mentioned in the query, or null.
 * "pol001" and "POL001" both give "POL001"; only the first id counts.
 */
export function classifyQuery(query: string): string | null {
  const m = POLICY_ID_RX.exec(query.toUpperCase());
  return m ? m[0] : null;
}
