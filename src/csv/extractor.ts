// ══ Field Value Extraction Utilities ═══════════════════════════════════════
// Safe parsers for register export cells → typed values

import { isValid, parse } from 'date-fns';

export interface AmountOptions {
  /**
   * Read a comma-only value grouped in threes as thousands ("151,077").
   * Off for register cells, where "," is always the decimal mark.
   */
  commaGrouping?: boolean;
}

/**
 * Parse an amount written in the register's locale, or undefined.
 *
 * "1.234,50" → 1234.5    ("." groups thousands, "," marks decimals)
 * "$ 119.000" → 119000
 * "12,500" → 12.5
 * "1,234.50" → 1234.5    (both present: right-most one is the decimal mark)
 * "$151,077" → 151077    (only with commaGrouping)
 * "(2.500)" / "-2.500" → -2500
 * "", "n/a" → undefined
 */
export function parseAmountStrict(
  val: string | undefined | null,
  options: AmountOptions = {}
): number | undefined {
  if (!val) return undefined;
  let text = val.trim();
  if (text === '') return undefined;

  let negative = false;
  if (/^\(.*\)$/.test(text)) {
    negative = true;
    text = text.slice(1, -1);
  }

  // Currency symbols, codes and every kind of space
  text = text.replace(/[$€£]|CLP|USD|\s/gi, '');
  if (text.startsWith('-')) {
    negative = !negative;
    text = text.slice(1);
  } else if (text.startsWith('+')) {
    text = text.slice(1);
  }

  if (!/^[\d.,]+$/.test(text) || !/\d/.test(text)) return undefined;

  const lastDot = text.lastIndexOf('.');
  const lastComma = text.lastIndexOf(',');
  let normalized: string;

  if (lastDot !== -1 && lastComma !== -1) {
    normalized = lastComma > lastDot
      ? text.replace(/\./g, '').replace(',', '.')
      : text.replace(/,/g, '');
  } else if (lastComma !== -1) {
    // A leading 0 group ("0,500") is never thousands
    normalized = options.commaGrouping && /^[1-9]\d{0,2}(,\d{3})+$/.test(text)
      ? text.replace(/,/g, '')
      : text.replace(',', '.');
  } else {
    normalized = text.replace(/\./g, '');
  }

  const parsed = Number(normalized);
  if (!Number.isFinite(parsed)) return undefined;
  return negative ? -parsed : parsed;
}

/**
 * Lenient variant used for register cells: blank and placeholder cells are
 * common in the exports, so anything unparsable counts as 0.
 */
export function parseAmount(val: string | undefined | null): number {
  return parseAmountStrict(val) ?? 0;
}

// Ordered: first match wins. The guard regex keeps "31/12/24" away from the
// 4-digit-year pattern, which date-fns would otherwise read as year 24.
const DATE_FORMATS: ReadonlyArray<{ guard: RegExp; pattern: string }> = [
  { guard: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: 'd/M/yyyy' },
  { guard: /^\d{4}-\d{1,2}-\d{1,2}$/, pattern: 'yyyy-M-d' },
  { guard: /^\d{1,2}-\d{1,2}-\d{4}$/, pattern: 'd-M-yyyy' },
  { guard: /^\d{1,2}\/\d{1,2}\/\d{2}$/, pattern: 'd/M/yy' },
];

// Fixed reference so two-digit years resolve the same way on every run
// (window 1950–2049).
const TWO_DIGIT_YEAR_REFERENCE = new Date(2000, 0, 1);

/**
 * Parse a register date. Any trailing time ("31/12/2024 10:15:00") is dropped.
 * Returns a local-midnight Date, or undefined when no format matches or the
 * calendar date does not exist ("31/02/2024").
 */
export function parseDate(val: string | undefined | null): Date | undefined {
  if (!val) return undefined;
  const datePart = val.trim().split(/\s+/)[0] ?? '';
  if (datePart === '') return undefined;

  for (const { guard, pattern } of DATE_FORMATS) {
    if (!guard.test(datePart)) continue;
    const date = parse(datePart, pattern, TWO_DIGIT_YEAR_REFERENCE);
    if (isValid(date)) return date;
  }
  return undefined;
}

/**
 * Extract a document-type code.
 * "33" → 33, "33.0" → 33, "Boleta Electrónica(39)" → 39, "" → undefined
 */
export function parseDocumentCode(val: string | undefined | null): number | undefined {
  if (!val) return undefined;
  const trimmed = val.trim();
  if (trimmed === '') return undefined;

  const embedded = trimmed.match(/\((\d+)\)/);
  if (embedded?.[1]) return parseInt(embedded[1], 10);

  if (!/^\d+(\.0+)?$/.test(trimmed)) return undefined;
  const code = parseInt(trimmed, 10);
  return code > 0 ? code : undefined;
}

/** Trimmed cell text; absent cells read as ''. */
export function cellText(val: string | undefined | null): string {
  return val ? val.trim() : '';
}
