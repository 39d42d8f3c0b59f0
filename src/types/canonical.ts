// ══ All ledger data uses these types ONLY ════════════════════════════════
// Raw delimited rows live in src/csv/decoder.ts (RawRow) and never leave the
// ingestion layer. Renderers receive Ledger + Totals and nothing else.

export type OperationKind = "OPENING" | "INCOME" | "EXPENSE";

// Numeric codes printed in the official cash book layout.
export const OPERATION_KIND_CODES: Record<OperationKind, number> = {
  OPENING: 0,
  INCOME: 1,
  EXPENSE: 2,
};

export type RecordOrigin =
  | "opening"
  | "sales-detail"
  | "sales-summary"
  | "purchase-detail"
  | "manual-payment"
  | "professional-fee";

export type DateSource =
  | "row"           // Parsed from the row's own date cell
  | "sibling"       // Borrowed from another row with the same folio in the file
  | "filename"      // Last day of the YYYY-MM found in the file name
  | "period"        // Dec 31 of the caller-supplied fiscal year
  | "current-year"  // Dec 31 of the current calendar year
  | "opening"       // Jan 1 of the period, opening record only
  | "edited";       // Set by an operation-date edit

export interface CanonicalRecord {
  id: string;                 // `${origin}:${sourceIndex}:${line}`, stable across edits
  sequence: number;           // Arrival order across the ingestion pass (sort tie-breaker)
  operationKind: OperationKind;
  documentNumber: string;     // Folio, "A al B" range, or descriptor
  documentType: number | string; // Fiscal code, or free-text label for manual entries
  counterpartyId: string;     // Tax id; empty for aggregated entries
  operationDate: Date;        // Local midnight
  description: string;
  flowAmount: number;         // Always >= 0, sign implied by operationKind
  taxBasisAmount: number;     // Always >= 0, may be 0
  // Diagnostics only, never read by business logic:
  origin: RecordOrigin;
  dateSource: DateSource;
  sourceName: string;
}

export interface LedgerEntry extends CanonicalRecord {
  correlative: number;        // 1-based position in the final order
}

export interface Ledger {
  period: string;
  entries: readonly LedgerEntry[];
}

export interface Totals {
  totalIncomeFlow: number;
  totalExpenseFlow: number;
  netFlow: number;
  incomeBasis: number;
  expenseBasis: number;
  netBasisResult: number;
}

export interface ImportWarning {
  source: string;             // File name or manual block label
  severity: "fatal" | "warn" | "info"; // fatal = whole source skipped
  element: string;            // e.g. "line 14", "columns", "file"
  message: string;
}

export type ValidationCode =
  | "duplicate"
  | "basis-exceeds-flow"
  | "correlative-gap"
  | "opening-position";

export interface ValidationWarning {
  code: ValidationCode;
  message: string;
  correlatives: number[];
}

export interface CashBook {
  ledger: Ledger;
  totals: Totals;
  validation: ValidationWarning[];
  importWarnings: ImportWarning[];
  revision: number;
}
