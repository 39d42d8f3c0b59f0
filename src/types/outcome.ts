import type { CanonicalRecord } from "./canonical";

// id and sequence are assigned by the ingestion pass, which sees every source.
export type RecordDraft = Omit<CanonicalRecord, "id" | "sequence">;

export type SkipReason =
  | "unrecognized-code"
  | "zero-total"
  | "no-date"
  | "malformed-line"
  | "header-line";

export type RowOutcome =
  | { ok: true; rowNumber: number; record: RecordDraft; note?: string }
  | { ok: false; rowNumber: number; reason: SkipReason; silent: boolean; message: string };
