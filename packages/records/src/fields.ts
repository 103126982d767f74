import { z } from "zod";
import type { RawRow } from "./types";

const digits = z.string().trim().regex(/^\d+$/).transform(Number);

/** The fields the assistant is allowed to talk about. */
export const PolicyFieldsSchema = z.object({
  policy_id: z.string().trim().regex(/^POL\d{3}$/),
  coverage_amount: digits,
  premium: digits,
  renewal_date: z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/),
});

export type PolicyFields = z.infer<typeof PolicyFieldsSchema>;

export function parsePolicyFields(row: RawRow): PolicyFields | null {
  const parsed = PolicyFieldsSchema.safeParse(row);
  return parsed.success ? parsed.data : null;
}
