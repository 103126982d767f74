import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { parsePolicyCsv, readPolicyRows } from "./load";

const CSV = [
  "policy_id,customer_name,policy_type,coverage_amount,premium,renewal_date",
  "POL001,Test Person,Health,250000,500,2026-03-01",
  "POL002,Other Person,Home,400000,900,2026-07-15",
].join("\n");

describe("parsePolicyCsv", () => {
  it("returns one string row per data line", () => {
    const rows = parsePolicyCsv(CSV);

    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      policy_id: "POL001",
      customer_name: "Test Person",
      policy_type: "Health",
      coverage_amount: "250000",
      premium: "500",
      renewal_date: "2026-03-01",
    });
  });

  it("returns nothing for an empty file", () => {
    expect(parsePolicyCsv("")).toEqual([]);
  });
});

describe("readPolicyRows", () => {
  it("fails when the file does not exist", () => {
    const missing = join(tmpdir(), "no-such-dir", "policies.csv");
    expect(() => readPolicyRows(missing)).toThrow(`CSV file not found at ${missing}`);
  });

  it("strips a byte order mark before parsing", () => {
    const dir = mkdtempSync(join(tmpdir(), "policy-qa-"));
    const path = join(dir, "policies.csv");
    writeFileSync(path, `\uFEFF${CSV}`, "utf8");

    const rows = readPolicyRows(path);

    expect(Object.keys(rows[1])[0]).toBe("policy_id");
    expect(rows[1].policy_id).toBe("POL002");
  });
});
