// Ledger assembly: opening record first, everything else by date, then a
// contiguous correlative. Edits never patch a ledger in place; they rebuild
// the record list and re-run assembleLedger from scratch.

import { isValid, startOfDay } from "date-fns";
import type { CanonicalRecord, Ledger, LedgerEntry } from "../types/canonical";
import { LedgerEditError } from "../types/errors";

export const OPENING_RECORD_ID = "opening";
export const OPENING_DESCRIPTION = "Saldo Inicial";

export interface OpeningSettings {
  period: string;
  openingAmount: number;
  companyTaxId?: string;
  now?: Date;
}

export type LedgerEdit =
  | { type: "opening-amount"; amount: number }
  | { type: "operation-date"; recordId: string; date: Date };

/** Jan 1 of the period year; current year when the period is not a year. */
export function openingDate(period: string, now: Date = new Date()): Date {
  const trimmed = period.trim();
  const year = /^\d{4}$/.test(trimmed) ? parseInt(trimmed, 10) : now.getFullYear();
  return new Date(year, 0, 1);
}

export function createOpeningRecord(settings: OpeningSettings): CanonicalRecord {
  return {
    id: OPENING_RECORD_ID,
    sequence: 0,
    operationKind: "OPENING",
    documentNumber: "",
    documentType: "",
    counterpartyId: settings.companyTaxId ?? "",
    operationDate: openingDate(settings.period, settings.now),
    description: OPENING_DESCRIPTION,
    flowAmount: settings.openingAmount,
    taxBasisAmount: 0,
    origin: "opening",
    dateSource: "opening",
    sourceName: "",
  };
}

/** Date ascending; equal dates keep arrival order. */
export function compareRecords(a: CanonicalRecord, b: CanonicalRecord): number {
  const byDate = a.operationDate.getTime() - b.operationDate.getTime();
  return byDate !== 0 ? byDate : a.sequence - b.sequence;
}

export function toRecord(entry: LedgerEntry): CanonicalRecord {
  const { correlative: _correlative, ...record } = entry;
  return record;
}

export function assembleLedger(
  period: string,
  opening: CanonicalRecord,
  records: readonly CanonicalRecord[]
): Ledger {
  const others = records.filter((r) => r.operationKind !== "OPENING").sort(compareRecords);
  const entries: LedgerEntry[] = [opening, ...others].map((record, index) => ({
    ...record,
    correlative: index + 1,
  }));
  return { period, entries };
}

function checkAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new LedgerEditError(`Opening amount must be a non-negative number, got ${amount}`);
  }
}

/**
 * Applies every edit, then rebuilds the ledger wholesale. Throws
 * LedgerEditError on the first invalid edit; the input ledger is untouched.
 */
export function applyLedgerEdits(ledger: Ledger, edits: readonly LedgerEdit[]): Ledger {
  const records = ledger.entries.map(toRecord);
  const openingIndex = records.findIndex((r) => r.operationKind === "OPENING");
  if (openingIndex === -1) {
    throw new LedgerEditError("Ledger has no opening record");
  }

  for (const edit of edits) {
    switch (edit.type) {
      case "opening-amount": {
        checkAmount(edit.amount);
        const opening = records[openingIndex];
        if (opening) records[openingIndex] = { ...opening, flowAmount: edit.amount };
        break;
      }
      case "operation-date": {
        if (!isValid(edit.date)) {
          throw new LedgerEditError(`Invalid date for record ${edit.recordId}`);
        }
        const index = records.findIndex((r) => r.id === edit.recordId);
        const target = records[index];
        if (!target) {
          throw new LedgerEditError(`Unknown record ${edit.recordId}`);
        }
        records[index] = { ...target, operationDate: startOfDay(edit.date), dateSource: "edited" };
        break;
      }
    }
  }

  const opening = records[openingIndex];
  if (!opening) {
    throw new LedgerEditError("Ledger has no opening record");
  }
  return assembleLedger(ledger.period, opening, records);
}
