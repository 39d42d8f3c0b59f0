export type {
  CanonicalRecord,
  CashBook,
  DateSource,
  ImportWarning,
  Ledger,
  LedgerEntry,
  OperationKind,
  RecordOrigin,
  Totals,
  ValidationCode,
  ValidationWarning,
} from "./types/canonical";
export { OPERATION_KIND_CODES } from "./types/canonical";
export {
  CashBookError,
  DecodeError,
  LedgerEditError,
  MappingError,
  NoUsableInputError,
} from "./types/errors";
export type { RowOutcome, SkipReason } from "./types/outcome";

export { COLUMN_SCHEMAS } from "./config/aliases";
export type { SourceSchema } from "./config/aliases";
export { DOCUMENT_TYPE_NAMES, documentTypeLabel } from "./config/documentTypes";

export { decodeTable, detectSeparator } from "./csv/decoder";
export type { DecodedTable, RawRow, Separator } from "./csv/decoder";
export { mapColumns } from "./csv/columns";
export type { ColumnMap, ExtraAliases } from "./csv/columns";
export { parseAmount, parseAmountStrict, parseDate, parseDocumentCode } from "./csv/extractor";
export type { AmountOptions } from "./csv/extractor";
export { parseManualEntries } from "./manual/parser";
export type { ManualFormat } from "./manual/parser";

export { formatIsoDate, resolveOperationDate } from "./engine/dates";
export type { DateFallback } from "./engine/dates";
export {
  classifyPurchaseDocument,
  classifySalesDocument,
  classifySummaryDocument,
} from "./engine/classifier";
export { applyLedgerEdits, assembleLedger, createOpeningRecord } from "./engine/ledger";
export type { LedgerEdit } from "./engine/ledger";
export { computeTotals } from "./engine/totals";
export { validateLedger } from "./engine/validator";

export { ingestSources, DEFAULT_INGEST_OPTIONS } from "./pipeline/ingest";
export type { CashBookSources, IngestOptions, SourceFile } from "./pipeline/ingest";
export { applyCashBookEdits, buildCashBook, generateCashBook } from "./pipeline/cashBook";
export type { CashBookSettings } from "./pipeline/cashBook";
export { createCashBookStore } from "./store/cashBookStore";
export type { CashBookStore } from "./store/cashBookStore";
