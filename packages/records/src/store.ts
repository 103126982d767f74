// packages/records/src/store.ts
import { POLICY_ID_FIELD_RX } from "./constants";
import type { PolicyDocument, PolicyRecord, RawRow, RecordStore } from "./types";

export function serializeRow(row: RawRow): string {
  return Object.entries(row)
    .map(([k, v]) => `${k}: ${v}`)
    .join("\n");
}

export function extractPolicyId(content: string): string | null {
  const m = POLICY_ID_FIELD_RX.exec(content);
  return m ? m[1] : null;
}

/**
 * Builds the lookup map once. Rows without a policy_id stay in `documents`
 * but never reach `byId`; a repeated id keeps the last row.
 */
export function buildRecordStore(rows: RawRow[], source: string): RecordStore {
  const documents: PolicyDocument[] = [];
  const byId = new Map<string, PolicyRecord>();

  rows.forEach((row, i) => {
    const content = serializeRow(row);
    const metadata = Object.freeze({ source, row: i, fields: Object.freeze(Object.keys(row)) });
    documents.push(Object.freeze({ content, metadata }));

    const id = extractPolicyId(content);
    if (id) byId.set(id, Object.freeze({ id, content, metadata }));
  });

  const skipped = documents.length - byId.size;
  console.log(`[records] Created dictionary for ${byId.size} unique policy IDs.`);
  if (skipped > 0) {
    console.log(`[records] ${skipped} row(s) not in the lookup map (missing or repeated policy_id)`);
  }

  return Object.freeze({ documents: Object.freeze(documents), byId });
}
