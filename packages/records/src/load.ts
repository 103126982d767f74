// packages/records/src/load.ts
import { existsSync, readFileSync } from "fs";
import * as xlsx from "xlsx";
import type { RawRow } from "./types";

function toRawRow(row: Record<string, unknown>): RawRow {
  const out: RawRow = {};
  for (const [k, v] of Object.entries(row)) {
    out[k.trim()] = v === undefined || v === null ? "" : String(v).trim();
  }
  return out;
}

/**
 * Reads the policy CSV as plain text rows.
 * Cells stay strings: ids, amounts and dates are not coerced by the parser.
 */
export function readPolicyRows(path: string): RawRow[] {
  if (!existsSync(path)) {
    throw new Error(`CSV file not found at ${path}`);
  }

  const text = readFileSync(path, "utf8").replace(/^\uFEFF/, "");
  return parsePolicyCsv(text);
}

export function parsePolicyCsv(text: string): RawRow[] {
  if (!text.trim()) return [];

  const workbook = xlsx.read(text, { type: "string", raw: true });
  const first = workbook.SheetNames[0];
  if (!first) return [];

  const rows = xlsx.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[first], {
    defval: "",
    raw: true,
  });
  return rows.map(toRawRow);
}
