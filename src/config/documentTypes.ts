// ══ Fiscal document-type code table ══════════════════════════════════════
// Names are the official register labels; they end up in ledger glosas and
// in the renderer's "Tipo Documento" column.

export const DOCUMENT_TYPE_NAMES: Readonly<Record<number, string>> = {
  33: "Factura Electrónica",
  34: "Factura No Afecta o Exenta Elec.",
  35: "Boleta Afecta Electrónica",
  38: "Boleta No Afecta o Exenta Elec.",
  39: "Boleta Electrónica",
  41: "Boleta Exenta Electrónica",
  46: "Factura de Compra Electrónica",
  48: "Comprobante de Pago Electrónico",
  52: "Guía de Despacho Electrónica",
  56: "Nota de Débito Electrónica",
  61: "Nota de Crédito Electrónica",
  110: "Factura de Exportación Electrónica",
  111: "Nota de Débito de Exportación Elec.",
  112: "Nota de Crédito de Exportación Elec.",
};

export const SALES_INVOICES: ReadonlySet<number> = new Set([33, 34, 110]);
export const CREDIT_NOTES: ReadonlySet<number> = new Set([61, 112]);
export const DEBIT_NOTES: ReadonlySet<number> = new Set([56, 111]);

// Only reported through per-day summaries, never per document.
export const AFFECTED_RECEIPTS: ReadonlySet<number> = new Set([35, 39]);
export const EXEMPT_RECEIPTS: ReadonlySet<number> = new Set([38, 41]);
export const PAYMENT_VOUCHERS: ReadonlySet<number> = new Set([48]);

/**
 * Renderer label for a document type.
 * 39 → "(39) Boleta Electrónica", "Honorarios" → "Honorarios", 999 → "999"
 */
export function documentTypeLabel(documentType: number | string): string {
  if (typeof documentType === "string") return documentType;
  const name = DOCUMENT_TYPE_NAMES[documentType];
  return name ? `(${documentType}) ${name}` : String(documentType);
}
