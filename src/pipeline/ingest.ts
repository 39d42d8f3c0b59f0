// Ingestion pass: every source, in arrival order, each isolated.
// A file that cannot be decoded or mapped contributes one fatal warning and
// nothing else; the rest of the batch carries on.

import { decodeTable, type DecodedTable } from "../csv/decoder";
import { mapColumns, type ExtraAliases } from "../csv/columns";
import {
  normalizePurchaseDetail,
  normalizeSalesDetail,
  normalizeSalesSummary,
  type NormalizeContext,
} from "../csv/normalizer";
import { MANUAL_ORIGINS, parseManualEntries, type ManualFormat } from "../manual/parser";
import { ALL_DATE_FALLBACKS, type DateFallback } from "../engine/dates";
import type { CanonicalRecord, ImportWarning, RecordOrigin } from "../types/canonical";
import { describeError } from "../types/errors";
import type { RowOutcome } from "../types/outcome";

export interface SourceFile {
  name: string;
  bytes: Uint8Array;
}

export interface CashBookSources {
  salesDetail?: SourceFile[];
  salesSummary?: SourceFile[];
  purchaseDetail?: SourceFile[];
  /** Pasted 6-field generic payment lines. */
  manualPayments?: string;
  /** Pasted 8-field professional fee lines. */
  professionalFees?: string;
}

export interface IngestOptions {
  /** Extra header aliases, tried after the built-in ones. */
  extraAliases?: ExtraAliases;
  /** Date fallback steps to enable; the chain order itself is fixed. */
  dateFallbacks?: readonly DateFallback[];
  /** Clock for the current-year fallback. */
  now?: Date;
}

export const DEFAULT_INGEST_OPTIONS: Required<Omit<IngestOptions, "now">> = {
  extraAliases: {},
  dateFallbacks: ALL_DATE_FALLBACKS,
};

export interface IngestResult {
  records: CanonicalRecord[];
  warnings: ImportWarning[];
}

type FileNormalizer = (table: DecodedTable, ctx: NormalizeContext, extra: ExtraAliases) => RowOutcome[];

const FILE_NORMALIZERS: Record<"sales-detail" | "sales-summary" | "purchase-detail", FileNormalizer> = {
  "sales-detail": (table, ctx, extra) =>
    normalizeSalesDetail(table, mapColumns("sales-detail", table.headers, table.fileName, extra), ctx),
  "sales-summary": (table, ctx, extra) =>
    normalizeSalesSummary(table, mapColumns("sales-summary", table.headers, table.fileName, extra), ctx),
  "purchase-detail": (table, ctx, extra) =>
    normalizePurchaseDetail(table, mapColumns("purchase-detail", table.headers, table.fileName, extra), ctx),
};

const MANUAL_LABELS: Record<ManualFormat, string> = {
  "generic-payment": "manual payments",
  "professional-fee": "professional fees",
};

class RecordCollector {
  readonly records: CanonicalRecord[] = [];
  readonly warnings: ImportWarning[] = [];
  private sequence = 0;

  /** Turns outcomes into records and warnings; returns the number of records kept. */
  collect(outcomes: RowOutcome[], origin: RecordOrigin, sourceIndex: number, source: string): number {
    let kept = 0;
    for (const outcome of outcomes) {
      const element = `row ${outcome.rowNumber}`;
      if (!outcome.ok) {
        if (!outcome.silent) {
          this.warnings.push({ source, severity: "warn", element, message: outcome.message });
        }
        continue;
      }
      this.sequence += 1;
      this.records.push({
        ...outcome.record,
        id: `${origin}:${sourceIndex}:${outcome.rowNumber}`,
        sequence: this.sequence,
      });
      if (outcome.note) {
        this.warnings.push({ source, severity: "info", element, message: outcome.note });
      }
      kept += 1;
    }
    return kept;
  }

  fatal(source: string, error: unknown): void {
    this.warnings.push({ source, severity: "fatal", element: "file", message: describeError(error) });
  }
}

export function ingestSources(
  sources: CashBookSources,
  period: string,
  options: IngestOptions = {}
): IngestResult {
  const extra = options.extraAliases ?? DEFAULT_INGEST_OPTIONS.extraAliases;
  const ctx: NormalizeContext = {
    period,
    now: options.now ?? new Date(),
    fallbacks: options.dateFallbacks ?? DEFAULT_INGEST_OPTIONS.dateFallbacks,
  };
  const collector = new RecordCollector();

  const files: Array<[keyof typeof FILE_NORMALIZERS, SourceFile[]]> = [
    ["sales-detail", sources.salesDetail ?? []],
    ["sales-summary", sources.salesSummary ?? []],
    ["purchase-detail", sources.purchaseDetail ?? []],
  ];

  for (const [origin, group] of files) {
    group.forEach((file, index) => {
      try {
        const table = decodeTable(file.bytes, file.name);
        const outcomes = FILE_NORMALIZERS[origin](table, ctx, extra);
        const kept = collector.collect(outcomes, origin, index, file.name);
        console.log(`[Ingest] ${file.name} (${origin}): ${kept} of ${table.rows.length} rows kept`);
      } catch (error) {
        console.warn(`[Ingest] Skipping ${file.name}: ${describeError(error)}`);
        collector.fatal(file.name, error);
      }
    });
  }

  const manual: Array<[ManualFormat, string | undefined]> = [
    ["generic-payment", sources.manualPayments],
    ["professional-fee", sources.professionalFees],
  ];
  for (const [format, text] of manual) {
    if (!text || text.trim() === "") continue;
    const label = MANUAL_LABELS[format];
    const outcomes = parseManualEntries(text, format, label);
    const kept = collector.collect(outcomes, MANUAL_ORIGINS[format], 0, label);
    console.log(`[Ingest] ${label}: ${kept} entries kept`);
  }

  return { records: collector.records, warnings: collector.warnings };
}
