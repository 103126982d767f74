/** One CSV row keyed by header, in column order. */
export type RawRow = Record<string, string>;

export type PolicyDocumentMetadata = {
  source: string;
  /** zero-based data row */
  row: number;
  /** header order, i.e. the position of every field in `content` */
  fields: readonly string[];
};

export type PolicyDocument = {
  /** `key: value` lines, one per column */
  readonly content: string;
  readonly metadata: Readonly<PolicyDocumentMetadata>;
};

export type PolicyRecord = PolicyDocument & { readonly id: string };

export type RecordStore = {
  /** Every row, including the ones without a usable policy_id */
  readonly documents: readonly PolicyDocument[];
  readonly byId: ReadonlyMap<string, PolicyRecord>;
};
