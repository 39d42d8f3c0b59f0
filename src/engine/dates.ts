// Operation-date fallback chain for register rows.
// Order: own cell → sibling row with same document → file name YYYY-MM →
// period year end → current year end. First hit wins.

import { format, lastDayOfMonth } from "date-fns";
import type { DateSource } from "../types/canonical";
import { parseDate } from "../csv/extractor";

export type DateFallback = "sibling" | "filename" | "period" | "current-year";

export const ALL_DATE_FALLBACKS: readonly DateFallback[] = [
  "sibling",
  "filename",
  "period",
  "current-year",
];

export interface ResolvedDate {
  date: Date;
  source: DateSource;
}

export interface DateContext {
  fileName: string;
  period: string;
  now: Date;
  fallbacks: readonly DateFallback[];
  /** Document key → first parsable date seen for it in the same file. */
  siblingDates: ReadonlyMap<string, Date>;
}

export function formatIsoDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

/**
 * Pre-pass over one file: first parsable date per document key.
 * Blank keys never match (aggregated rows carry no identifier).
 */
export function collectSiblingDates(
  rows: ReadonlyArray<{ key: string; dateCell: string }>
): Map<string, Date> {
  const dates = new Map<string, Date>();
  for (const { key, dateCell } of rows) {
    if (!key || dates.has(key)) continue;
    const date = parseDate(dateCell);
    if (date) dates.set(key, date);
  }
  return dates;
}

/**
 * Last day of the month named in a file name.
 * "ventas_2024-11.csv" → 2024-11-30, "RCV_202402_76123456.csv" → 2024-02-29.
 * Several candidates: the last plausible one wins, since tax ids and
 * sequence numbers earlier in the name also produce 6-digit runs.
 */
export function dateFromFileName(fileName: string): Date | undefined {
  let found: Date | undefined;
  for (const match of fileName.matchAll(/(\d{4})[_-]?(\d{2})/g)) {
    const year = parseInt(match[1] ?? "", 10);
    const month = parseInt(match[2] ?? "", 10);
    if (year >= 2000 && year <= 2100 && month >= 1 && month <= 12) {
      found = lastDayOfMonth(new Date(year, month - 1, 1));
    }
  }
  return found;
}

/** Dec 31 of a 4-digit period year; undefined for anything else. */
export function periodYearEnd(period: string): Date | undefined {
  const trimmed = period.trim();
  if (!/^\d{4}$/.test(trimmed)) return undefined;
  return new Date(parseInt(trimmed, 10), 11, 31);
}

export function resolveOperationDate(
  dateCell: string,
  documentKey: string,
  ctx: DateContext
): ResolvedDate | undefined {
  const own = parseDate(dateCell);
  if (own) return { date: own, source: "row" };

  // Fixed order; ctx.fallbacks only switches steps on or off
  for (const fallback of ALL_DATE_FALLBACKS) {
    if (!ctx.fallbacks.includes(fallback)) continue;
    switch (fallback) {
      case "sibling": {
        const sibling = documentKey ? ctx.siblingDates.get(documentKey) : undefined;
        if (sibling) return { date: sibling, source: "sibling" };
        break;
      }
      case "filename": {
        const fromName = dateFromFileName(ctx.fileName);
        if (fromName) return { date: fromName, source: "filename" };
        break;
      }
      case "period": {
        const yearEnd = periodYearEnd(ctx.period);
        if (yearEnd) return { date: yearEnd, source: "period" };
        break;
      }
      case "current-year":
        return { date: new Date(ctx.now.getFullYear(), 11, 31), source: "current-year" };
    }
  }
  return undefined;
}
