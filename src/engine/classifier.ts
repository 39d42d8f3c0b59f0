// Document-type code → operation kind + flow/basis amounts.
// Simplified-regime rule: VAT never enters the tax basis, so basis is built
// from net and exempt amounts (plus cost adjustments on purchases).

import type { OperationKind } from "../types/canonical";
import {
  AFFECTED_RECEIPTS,
  CREDIT_NOTES,
  DEBIT_NOTES,
  EXEMPT_RECEIPTS,
  PAYMENT_VOUCHERS,
  SALES_INVOICES,
} from "../config/documentTypes";

export interface DocumentAmounts {
  net: number;
  exempt: number;
  total: number;
}

// Purchase-only columns that legally add to taxable cost.
export interface PurchaseAmounts extends DocumentAmounts {
  fixedAssetNet: number;
  nonRecoverableTax: number;
  tobaccoCigars: number;
  tobaccoCigarettes: number;
  tobaccoProcessed: number;
  nonCreditableTax: number;
  otherTax: number;
}

export type Classification =
  | {
      kind: "classified";
      operationKind: OperationKind;
      flowAmount: number;
      taxBasisAmount: number;
      /** Glosa prefix, e.g. "NC Venta". */
      label: string;
    }
  | { kind: "unrecognized" }
  | { kind: "zero-total" };

export function salesBasis(a: DocumentAmounts): number {
  return Math.abs(a.net + a.exempt);
}

export function purchaseBasis(a: PurchaseAmounts): number {
  return Math.abs(
    a.net +
      a.exempt +
      a.fixedAssetNet +
      a.nonRecoverableTax +
      a.tobaccoCigars +
      a.tobaccoCigarettes +
      a.tobaccoProcessed +
      a.nonCreditableTax +
      a.otherTax
  );
}

export function isSummaryReceiptCode(code: number): boolean {
  return AFFECTED_RECEIPTS.has(code) || EXEMPT_RECEIPTS.has(code) || PAYMENT_VOUCHERS.has(code);
}

function classified(
  operationKind: OperationKind,
  total: number,
  basis: number,
  label: string
): Classification {
  if (total === 0) return { kind: "zero-total" };
  return { kind: "classified", operationKind, flowAmount: Math.abs(total), taxBasisAmount: basis, label };
}

/**
 * Per-document sales register. Receipts never appear here (they are
 * reported through daily summaries), so only invoices and notes count.
 *   invoice → INCOME, credit note → EXPENSE (refund), debit note → INCOME
 */
export function classifySalesDocument(code: number | undefined, a: DocumentAmounts): Classification {
  if (code === undefined) return { kind: "unrecognized" };
  if (CREDIT_NOTES.has(code)) return classified("EXPENSE", a.total, salesBasis(a), "NC Venta");
  if (DEBIT_NOTES.has(code)) return classified("INCOME", a.total, salesBasis(a), "ND Venta");
  if (SALES_INVOICES.has(code)) return classified("INCOME", a.total, salesBasis(a), "Venta");
  return { kind: "unrecognized" };
}

/**
 * Daily sales summary. Invoices and notes are skipped here because the
 * per-document register already carries them; only receipts and payment
 * vouchers convert, always as INCOME.
 */
export function classifySummaryDocument(code: number | undefined, a: DocumentAmounts): Classification {
  if (code === undefined || !isSummaryReceiptCode(code)) return { kind: "unrecognized" };
  return classified("INCOME", a.total, salesBasis(a), "Resumen ventas boletas del día");
}

/**
 * Purchase register. Any document that is not a note is a purchase.
 *   purchase → EXPENSE, supplier credit note → INCOME (refund), debit note → EXPENSE
 */
export function classifyPurchaseDocument(code: number | undefined, a: PurchaseAmounts): Classification {
  if (code === undefined) return { kind: "unrecognized" };
  if (CREDIT_NOTES.has(code)) return classified("INCOME", a.total, purchaseBasis(a), "NC Compra");
  if (DEBIT_NOTES.has(code)) return classified("EXPENSE", a.total, purchaseBasis(a), "ND Compra");
  return classified("EXPENSE", a.total, purchaseBasis(a), "Compra");
}
