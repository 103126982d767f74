// packages/records/src/index.ts
import { POLICY_CSV_PATH } from "./constants";
import { readPolicyRows } from "./load";
import { buildRecordStore } from "./store";
import type { RecordStore } from "./types";

export { readPolicyRows, parsePolicyCsv } from "./load";
export { buildRecordStore, serializeRow, extractPolicyId } from "./store";
export { parsePolicyFields, PolicyFieldsSchema, type PolicyFields } from "./fields";
export type { RawRow, PolicyDocument, PolicyRecord, RecordStore } from "./types";
export { POLICY_CSV_PATH } from "./constants";

/** Loads the CSV and builds the read-only store. Throws when the file is missing. */
export function loadRecordStore(path = POLICY_CSV_PATH): RecordStore {
  console.log("[records] Loading insurance policy data from CSV...");
  const rows = readPolicyRows(path);
  console.log(`[records] Successfully loaded ${rows.length} policy documents.`);
  return buildRecordStore(rows, path);
}
