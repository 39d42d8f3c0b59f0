// Cash book generation: ingestion → assembly → totals + validation.
// Assembly, totals and validation always run together (buildCashBook), on
// first generation and after every edit, so ordering, correlatives and
// aggregates can never drift apart.

import { applyLedgerEdits, assembleLedger, createOpeningRecord, type LedgerEdit } from "../engine/ledger";
import { computeTotals } from "../engine/totals";
import { validateLedger } from "../engine/validator";
import type { CashBook, ImportWarning, Ledger } from "../types/canonical";
import { NoUsableInputError } from "../types/errors";
import { ingestSources, type CashBookSources, type IngestOptions } from "./ingest";

export interface CashBookSettings {
  /** Fiscal year as "YYYY"; anything else falls back to the current year. */
  period: string;
  openingAmount: number;
  /** Company tax id, shown on the opening record. */
  companyTaxId?: string;
}

export function buildCashBook(ledger: Ledger, importWarnings: ImportWarning[], revision: number): CashBook {
  return {
    ledger,
    totals: computeTotals(ledger),
    validation: validateLedger(ledger),
    importWarnings,
    revision,
  };
}

/**
 * Runs the whole pipeline. Throws NoUsableInputError when no source yields
 * a single record; every other failure is reported in importWarnings.
 */
export function generateCashBook(
  sources: CashBookSources,
  settings: CashBookSettings,
  options: IngestOptions = {}
): CashBook {
  const { records, warnings } = ingestSources(sources, settings.period, options);
  if (records.length === 0) {
    throw new NoUsableInputError(warnings);
  }

  let openingAmount = settings.openingAmount;
  if (!Number.isFinite(openingAmount) || openingAmount < 0) {
    warnings.push({
      source: "settings",
      severity: "warn",
      element: "openingAmount",
      message: `Opening amount ${openingAmount} is not a non-negative number; using 0`,
    });
    openingAmount = 0;
  }

  const opening = createOpeningRecord({
    period: settings.period,
    openingAmount,
    companyTaxId: settings.companyTaxId,
    now: options.now,
  });
  const ledger = assembleLedger(settings.period, opening, records);
  console.log(`[CashBook] ${ledger.entries.length} entries, ${warnings.length} import warnings`);

  return buildCashBook(ledger, warnings, 1);
}

/** New cash book with the edits applied; the given one is left as is. */
export function applyCashBookEdits(cashBook: CashBook, edits: readonly LedgerEdit[]): CashBook {
  const ledger = applyLedgerEdits(cashBook.ledger, edits);
  return buildCashBook(ledger, cashBook.importWarnings, cashBook.revision + 1);
}
