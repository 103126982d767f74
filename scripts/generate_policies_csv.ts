// scripts/generate_policies_csv.ts
// Writes a synthetic policy dataset: npm run generate:data -- [count] [outPath]
import { readFileSync, writeFileSync } from "fs";
import { z } from "zod";
import * as xlsx from "xlsx";

const POLICY_TYPES = {
  Health: { coverage: [100_000, 500_000], premium: [300, 1000] },
  Auto: { coverage: [50_000, 300_000], premium: [200, 800] },
  Life: { coverage: [200_000, 1_000_000], premium: [500, 2000] },
  Home: { coverage: [100_000, 700_000], premium: [400, 1500] },
  Travel: { coverage: [25_000, 150_000], premium: [100, 600] },
} as const;

type PolicyType = keyof typeof POLICY_TYPES;
const TYPES = Object.keys(POLICY_TYPES).filter((k): k is PolicyType => k in POLICY_TYPES);

const randInt = (min: number, max: number) => min + Math.floor(Math.random() * (max - min + 1));
const pick = <T>(xs: readonly T[]): T => xs[randInt(0, xs.length - 1)];
const roundTo = (n: number, step: number) => Math.round(n / step) * step;

function loadNames(): string[] {
  const raw: unknown = JSON.parse(readFileSync(new URL("../data/names.json", import.meta.url), "utf8"));
  return z.array(z.string().min(1)).nonempty().parse(raw);
}

function main() {
  const count = Number(process.argv[2] ?? 100);
  const out = process.argv[3] ?? "data/insurance_policies.csv";
  if (!Number.isInteger(count) || count < 1 || count > 999) {
    throw new Error(`count must be an integer in 1..999, got '${process.argv[2]}'`);
  }

  const names = loadNames();
  const rows = Array.from({ length: count }, (_, i) => {
    const type = pick(TYPES);
    const { coverage, premium } = POLICY_TYPES[type];
    const renewal = new Date(Date.now() + randInt(30, 365) * 86_400_000);
    return {
      policy_id: `POL${String(i + 1).padStart(3, "0")}`,
      customer_name: pick(names),
      policy_type: type,
      coverage_amount: roundTo(randInt(coverage[0], coverage[1]), 1000),
      premium: roundTo(randInt(premium[0], premium[1]), 100),
      renewal_date: renewal.toISOString().slice(0, 10),
    };
  });

  const csv = xlsx.utils.sheet_to_csv(xlsx.utils.json_to_sheet(rows));
  writeFileSync(out, `${csv}\n`, "utf8");
  console.log(`[generate] ${rows.length} policies written to ${out}`);
}

main();
