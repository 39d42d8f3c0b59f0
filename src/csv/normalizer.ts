// ══ Register Row Normalization Layer ═════════════════════════════════════
// Converts decoded register rows into record drafts. Every row yields a
// RowOutcome: a draft, or a skip with its reason. Nothing here throws for
// bad row content; the ingestion pass turns non-silent skips into warnings.

import type { DecodedTable, RawRow } from './decoder';
import { readField, type ColumnMap } from './columns';
import { cellText, parseAmount, parseDocumentCode } from './extractor';
import type { PurchaseDetailField, SalesDetailField, SalesSummaryField } from '../config/aliases';
import { DOCUMENT_TYPE_NAMES } from '../config/documentTypes';
import {
  classifyPurchaseDocument,
  classifySalesDocument,
  classifySummaryDocument,
  type Classification,
} from '../engine/classifier';
import {
  collectSiblingDates,
  formatIsoDate,
  resolveOperationDate,
  type DateContext,
  type DateFallback,
} from '../engine/dates';
import type { RecordOrigin } from '../types/canonical';
import type { RowOutcome } from '../types/outcome';

export interface NormalizeContext {
  period: string;
  now: Date;
  fallbacks: readonly DateFallback[];
}

// Placeholder document number for summary rows without a folio range.
export const SUMMARY_DOCUMENT_PLACEHOLDER = 'Z';

// ══════════════════════════════════════════════════════════════════════════
// Helper: classification + date → outcome
// ══════════════════════════════════════════════════════════════════════════

interface RowParts {
  rowNumber: number;
  classification: Classification;
  code: string;
  dateCell: string;
  documentKey: string;
  documentNumber: string;
  documentType: number;
  counterpartyId: string;
  describe: (label: string) => string;
}

function buildOutcome(parts: RowParts, origin: RecordOrigin, dates: DateContext): RowOutcome {
  const { rowNumber, classification } = parts;

  if (classification.kind === 'unrecognized') {
    return {
      ok: false,
      rowNumber,
      reason: 'unrecognized-code',
      silent: true,
      message: `document type "${parts.code}" not handled by this register`,
    };
  }
  if (classification.kind === 'zero-total') {
    return { ok: false, rowNumber, reason: 'zero-total', silent: true, message: 'total amount is zero' };
  }

  const resolved = resolveOperationDate(parts.dateCell, parts.documentKey, dates);
  if (!resolved) {
    return {
      ok: false,
      rowNumber,
      reason: 'no-date',
      silent: false,
      message: `no usable operation date ("${parts.dateCell}")`,
    };
  }

  const inferred = resolved.source !== 'row' && resolved.source !== 'sibling';
  return {
    ok: true,
    rowNumber,
    note: inferred ? `date inferred from ${resolved.source}: ${formatIsoDate(resolved.date)}` : undefined,
    record: {
      operationKind: classification.operationKind,
      documentNumber: parts.documentNumber,
      documentType: parts.documentType,
      counterpartyId: parts.counterpartyId,
      operationDate: resolved.date,
      description: parts.describe(classification.label),
      flowAmount: classification.flowAmount,
      taxBasisAmount: classification.taxBasisAmount,
      origin,
      dateSource: resolved.source,
      sourceName: dates.fileName,
    },
  };
}

function withName(name: string): (label: string) => string {
  return (label) => (name ? `${label} - ${name}` : label);
}

function detailKey(code: number | undefined, folio: string): string {
  return folio ? `${code ?? ''}:${folio}` : '';
}

function dateContext(
  table: DecodedTable,
  ctx: NormalizeContext,
  keyed: ReadonlyArray<{ key: string; dateCell: string }>
): DateContext {
  return {
    fileName: table.fileName,
    period: ctx.period,
    now: ctx.now,
    fallbacks: ctx.fallbacks,
    siblingDates: collectSiblingDates(keyed),
  };
}

function rowNumberAt(table: DecodedTable, index: number): number {
  return table.rowNumbers[index] ?? index + 2;
}

// ══════════════════════════════════════════════════════════════════════════
// Sales detail (one row per invoice / note)
// ══════════════════════════════════════════════════════════════════════════

export function normalizeSalesDetail(
  table: DecodedTable,
  map: ColumnMap<SalesDetailField>,
  ctx: NormalizeContext
): RowOutcome[] {
  const field = (row: RawRow, f: SalesDetailField) => readField(row, map, f);
  const keyOf = (row: RawRow) =>
    detailKey(parseDocumentCode(field(row, 'documentType')), cellText(field(row, 'folio')));

  const dates = dateContext(
    table,
    ctx,
    table.rows.map((row) => ({ key: keyOf(row), dateCell: field(row, 'date') }))
  );

  return table.rows.map((row, index) => {
    const codeCell = field(row, 'documentType');
    const code = parseDocumentCode(codeCell);
    const classification = classifySalesDocument(code, {
      net: parseAmount(field(row, 'net')),
      exempt: parseAmount(field(row, 'exempt')),
      total: parseAmount(field(row, 'total')),
    });

    return buildOutcome(
      {
        rowNumber: rowNumberAt(table, index),
        classification,
        code: cellText(codeCell),
        dateCell: field(row, 'date'),
        documentKey: keyOf(row),
        documentNumber: cellText(field(row, 'folio')),
        documentType: code ?? 0,
        counterpartyId: cellText(field(row, 'counterpartyId')),
        describe: withName(cellText(field(row, 'name'))),
      },
      'sales-detail',
      dates
    );
  });
}

// ══════════════════════════════════════════════════════════════════════════
// Sales summary (one row per receipt type, optionally per day)
// ══════════════════════════════════════════════════════════════════════════

/**
 * Document number of a summary row.
 * folio range 1001..1050 → "1001 al 1050"; no range → "Z"
 */
export function summaryDocumentNumber(from: string, to: string): string {
  return from && to ? `${from} al ${to}` : SUMMARY_DOCUMENT_PLACEHOLDER;
}

export function normalizeSalesSummary(
  table: DecodedTable,
  map: ColumnMap<SalesSummaryField>,
  ctx: NormalizeContext
): RowOutcome[] {
  const field = (row: RawRow, f: SalesSummaryField) => readField(row, map, f);
  const rangeOf = (row: RawRow) =>
    summaryDocumentNumber(cellText(field(row, 'folioFrom')), cellText(field(row, 'folioTo')));
  // Only a real folio range identifies a document; "Z" rows share nothing.
  const keyOf = (row: RawRow) => {
    const range = rangeOf(row);
    return range === SUMMARY_DOCUMENT_PLACEHOLDER ? '' : range;
  };

  const dates = dateContext(
    table,
    ctx,
    table.rows.map((row) => ({ key: keyOf(row), dateCell: field(row, 'date') }))
  );

  return table.rows.map((row, index) => {
    const typeLabel = cellText(field(row, 'documentType'));
    const code = parseDocumentCode(typeLabel);
    const classification = classifySummaryDocument(code, {
      net: parseAmount(field(row, 'net')),
      exempt: parseAmount(field(row, 'exempt')),
      total: parseAmount(field(row, 'total')),
    });
    const typeName = (code !== undefined ? DOCUMENT_TYPE_NAMES[code] : undefined) ?? typeLabel;

    return buildOutcome(
      {
        rowNumber: rowNumberAt(table, index),
        classification,
        code: typeLabel,
        dateCell: field(row, 'date'),
        documentKey: keyOf(row),
        documentNumber: rangeOf(row),
        documentType: code ?? 0,
        counterpartyId: '',
        describe: (label) => `${label} - ${typeName}`,
      },
      'sales-summary',
      dates
    );
  });
}

// ══════════════════════════════════════════════════════════════════════════
// Purchase detail (one row per received document)
// ══════════════════════════════════════════════════════════════════════════

export function normalizePurchaseDetail(
  table: DecodedTable,
  map: ColumnMap<PurchaseDetailField>,
  ctx: NormalizeContext
): RowOutcome[] {
  const field = (row: RawRow, f: PurchaseDetailField) => readField(row, map, f);
  const amount = (row: RawRow, f: PurchaseDetailField) => parseAmount(field(row, f));
  const keyOf = (row: RawRow) =>
    detailKey(parseDocumentCode(field(row, 'documentType')), cellText(field(row, 'folio')));

  const dates = dateContext(
    table,
    ctx,
    table.rows.map((row) => ({ key: keyOf(row), dateCell: field(row, 'date') }))
  );

  return table.rows.map((row, index) => {
    const codeCell = field(row, 'documentType');
    const code = parseDocumentCode(codeCell);
    // Absent adjustment columns read as 0, leaving basis = net + exempt.
    const classification = classifyPurchaseDocument(code, {
      net: amount(row, 'net'),
      exempt: amount(row, 'exempt'),
      total: amount(row, 'total'),
      fixedAssetNet: amount(row, 'fixedAssetNet'),
      nonRecoverableTax: amount(row, 'nonRecoverableTax'),
      tobaccoCigars: amount(row, 'tobaccoCigars'),
      tobaccoCigarettes: amount(row, 'tobaccoCigarettes'),
      tobaccoProcessed: amount(row, 'tobaccoProcessed'),
      nonCreditableTax: amount(row, 'nonCreditableTax'),
      otherTax: amount(row, 'otherTax'),
    });

    return buildOutcome(
      {
        rowNumber: rowNumberAt(table, index),
        classification,
        code: cellText(codeCell),
        dateCell: field(row, 'date'),
        documentKey: keyOf(row),
        documentNumber: cellText(field(row, 'folio')),
        documentType: code ?? 0,
        counterpartyId: cellText(field(row, 'counterpartyId')),
        describe: withName(cellText(field(row, 'name'))),
      },
      'purchase-detail',
      dates
    );
  });
}
