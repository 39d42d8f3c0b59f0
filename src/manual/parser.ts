// ══ Pasted manual entries ═════════════════════════════════════════════════
// Two fixed comma-separated layouts, one entry per line, quotes honoured so
// "$151,077" stays one field:
//
//   generic payment (6):   kind, document no, document type, date, narrative, amount
//   professional fee (8):  kind, document no, document type, tax id, date, name, paid, gross
//
// Each line stands alone; a bad line becomes a numbered skip, never an abort.

import { parse } from 'csv-parse/sync';
import { parseAmountStrict, parseDate, type AmountOptions } from '../csv/extractor';
import type { OperationKind, RecordOrigin } from '../types/canonical';
import { describeError } from '../types/errors';
import type { RecordDraft, RowOutcome } from '../types/outcome';

export type ManualFormat = 'generic-payment' | 'professional-fee';

const FIELD_COUNTS: Record<ManualFormat, number> = {
  'generic-payment': 6,
  'professional-fee': 8,
};

export const MANUAL_ORIGINS: Record<ManualFormat, RecordOrigin> = {
  'generic-payment': 'manual-payment',
  'professional-fee': 'professional-fee',
};

// Pasted amounts come from spreadsheets formatted with "," thousands
const PASTED_AMOUNTS: AmountOptions = { commaGrouping: true };

const HEADER_KEYWORDS = [
  'tipo', 'operación', 'operacion', 'documento', 'fecha', 'glosa',
  'monto', 'rut', 'nombre', 'kind', 'date', 'amount',
];

/**
 * Operation kind of a manual line. 0 (opening balance) is reserved for the
 * ledger's own opening record and is rejected here.
 * "1" / "ingreso" → INCOME, "2" / "egreso" → EXPENSE
 */
export function parseOperationCode(val: string): OperationKind | undefined {
  switch (val.trim().toLowerCase()) {
    case '1':
    case 'ingreso':
      return 'INCOME';
    case '2':
    case 'egreso':
      return 'EXPENSE';
    default:
      return undefined;
  }
}

function splitLine(line: string): string[] {
  const records: string[][] = parse(line, { relax_quotes: true, trim: true });
  return records[0] ?? [];
}

function looksLikeHeader(cells: string[]): boolean {
  if (parseOperationCode(cells[0] ?? '') !== undefined) return false;
  const text = cells.join(' ').toLowerCase();
  return HEADER_KEYWORDS.some((keyword) => text.includes(keyword));
}

type LineResult = { ok: true; record: RecordDraft } | { ok: false; message: string };

function fail(message: string): LineResult {
  return { ok: false, message };
}

function toRecord(cells: string[], format: ManualFormat, sourceName: string): LineResult {
  const operationKind = parseOperationCode(cells[0] ?? '');
  if (!operationKind) return fail(`unknown operation kind "${cells[0] ?? ''}" (expected 1 or 2)`);

  const base = {
    operationKind,
    documentNumber: cells[1] ?? '',
    documentType: cells[2] ?? '',
    origin: MANUAL_ORIGINS[format],
    dateSource: 'row' as const,
    sourceName,
  };

  if (format === 'generic-payment') {
    const [, , , dateCell = '', narrative = '', amountCell = ''] = cells;
    const operationDate = parseDate(dateCell);
    if (!operationDate) return fail(`invalid date "${dateCell}"`);
    const amount = parseAmountStrict(amountCell, PASTED_AMOUNTS);
    if (amount === undefined) return fail(`invalid amount "${amountCell}"`);

    return {
      ok: true,
      record: {
        ...base,
        counterpartyId: '',
        operationDate,
        description: narrative,
        flowAmount: Math.abs(amount),
        taxBasisAmount: 0,
      },
    };
  }

  const [, , label = '', counterpartyId = '', dateCell = '', name = '', paidCell = '', grossCell = ''] = cells;
  const operationDate = parseDate(dateCell);
  if (!operationDate) return fail(`invalid date "${dateCell}"`);
  const paid = parseAmountStrict(paidCell, PASTED_AMOUNTS);
  if (paid === undefined) return fail(`invalid paid amount "${paidCell}"`);
  const gross = parseAmountStrict(grossCell, PASTED_AMOUNTS);
  if (gross === undefined) return fail(`invalid gross amount "${grossCell}"`);

  // Cash leaves net of withholding; the gross fee is what the basis carries.
  return {
    ok: true,
    record: {
      ...base,
      counterpartyId,
      operationDate,
      description: label && name ? `${label} - ${name}` : name || label,
      flowAmount: Math.abs(paid),
      taxBasisAmount: Math.abs(gross),
    },
  };
}

export function parseManualEntries(
  text: string,
  format: ManualFormat,
  sourceName: string = format
): RowOutcome[] {
  const outcomes: RowOutcome[] = [];
  const expected = FIELD_COUNTS[format];
  let seenContent = false;

  text.split(/\r\n|\r|\n/).forEach((line, index) => {
    const rowNumber = index + 1;
    if (line.trim() === '') return;

    let cells: string[];
    try {
      cells = splitLine(line);
    } catch (error) {
      outcomes.push({
        ok: false, rowNumber, reason: 'malformed-line', silent: false,
        message: `unreadable line: ${describeError(error)}`,
      });
      seenContent = true;
      return;
    }

    const first = !seenContent;
    seenContent = true;
    if (first && looksLikeHeader(cells)) {
      outcomes.push({ ok: false, rowNumber, reason: 'header-line', silent: true, message: 'header line' });
      return;
    }

    if (cells.length !== expected) {
      outcomes.push({
        ok: false, rowNumber, reason: 'malformed-line', silent: false,
        message: `expected ${expected} fields, found ${cells.length}`,
      });
      return;
    }

    const result = toRecord(cells, format, sourceName);
    if (!result.ok) {
      outcomes.push({ ok: false, rowNumber, reason: 'malformed-line', silent: false, message: result.message });
      return;
    }
    if (result.record.flowAmount === 0) {
      outcomes.push({ ok: false, rowNumber, reason: 'zero-total', silent: true, message: 'amount is zero' });
      return;
    }
    outcomes.push({ ok: true, rowNumber, record: result.record });
  });

  return outcomes;
}
