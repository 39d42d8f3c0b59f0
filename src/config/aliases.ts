// ══ Header alias tables ══════════════════════════════════════════════════
// Canonical field → accepted header names, in priority order. Headers are
// compared lower-cased and trimmed, so aliases must be written lower-case.
// Exporters rename columns between releases; extend these lists (or pass
// IngestOptions.extraAliases) rather than special-casing files.

export type SourceSchema = "sales-detail" | "purchase-detail" | "sales-summary";

type DetailField =
  | "documentType"
  | "folio"
  | "date"
  | "counterpartyId"
  | "name"
  | "net"
  | "exempt"
  | "total";

export type SalesDetailField = DetailField;

export type PurchaseDetailField =
  | DetailField
  | "fixedAssetNet"
  | "nonRecoverableTax"
  | "tobaccoCigars"
  | "tobaccoCigarettes"
  | "tobaccoProcessed"
  | "nonCreditableTax"
  | "otherTax";

export type SalesSummaryField =
  | "documentType"
  | "date"
  | "folioFrom"
  | "folioTo"
  | "net"
  | "exempt"
  | "total";

export interface SchemaFields {
  "sales-detail": SalesDetailField;
  "purchase-detail": PurchaseDetailField;
  "sales-summary": SalesSummaryField;
}

export interface FieldAliases<F extends string> {
  field: F;
  aliases: readonly string[];
}

export interface ColumnSchema<F extends string> {
  required: readonly F[];
  columns: ReadonlyArray<FieldAliases<F>>;
}

const NET = ["monto neto", "monto_neto", "neto"];
const EXEMPT = ["monto exento", "monto_exento", "exento"];
const TOTAL = ["monto total", "monto_total", "total"];
const NAME = ["razon social", "razón social", "razon_social", "nombre"];

export const COLUMN_SCHEMAS: { readonly [S in SourceSchema]: ColumnSchema<SchemaFields[S]> } = {
  "sales-detail": {
    required: ["documentType", "date"],
    columns: [
      { field: "documentType", aliases: ["tipo doc", "tipo_doc", "tipodoc", "tipo documento"] },
      { field: "folio", aliases: ["folio", "n° folio", "numero folio"] },
      { field: "date", aliases: ["fecha docto", "fecha_docto", "fechadocto", "fecha operación", "fecha"] },
      { field: "counterpartyId", aliases: ["rut cliente", "rut_cliente", "rutcliente", "rut proveedor", "rut"] },
      { field: "name", aliases: NAME },
      { field: "net", aliases: NET },
      { field: "exempt", aliases: EXEMPT },
      { field: "total", aliases: TOTAL },
    ],
  },

  "purchase-detail": {
    required: ["documentType", "date"],
    columns: [
      { field: "documentType", aliases: ["tipo doc", "tipo_doc", "tipodoc", "tipo documento"] },
      { field: "folio", aliases: ["folio", "n° folio", "numero folio"] },
      // Document date first; reception date only when the export lacks it
      { field: "date", aliases: ["fecha docto", "fecha_docto", "fechadocto", "fecha recepcion", "fecha recepción", "fecha"] },
      { field: "counterpartyId", aliases: ["rut proveedor", "rut_proveedor", "rutproveedor", "rut"] },
      { field: "name", aliases: NAME },
      { field: "net", aliases: NET },
      { field: "exempt", aliases: EXEMPT },
      { field: "total", aliases: TOTAL },
      { field: "fixedAssetNet", aliases: ["monto neto activo fijo", "neto activo fijo", "activo fijo neto"] },
      { field: "nonRecoverableTax", aliases: ["monto iva no recuperable", "iva no recuperable", "monto_iva_no_recuperable"] },
      { field: "tobaccoCigars", aliases: ["tabacos puros", "tabaco puros"] },
      { field: "tobaccoCigarettes", aliases: ["tabacos cigarrillos", "tabaco cigarrillos"] },
      { field: "tobaccoProcessed", aliases: ["tabacos elaborados", "tabaco elaborado"] },
      { field: "nonCreditableTax", aliases: ["impto. sin derecho a credito", "impto sin derecho a credito", "impuesto sin derecho a crédito"] },
      { field: "otherTax", aliases: ["valor otro impuesto", "valor otro imp.", "otro impuesto"] },
    ],
  },

  "sales-summary": {
    required: ["documentType"],
    columns: [
      { field: "documentType", aliases: ["tipo documento", "tipo_documento", "tipodocumento", "tipo doc"] },
      { field: "date", aliases: ["fecha", "fecha docto", "fecha_docto"] },
      { field: "folioFrom", aliases: ["folio inicial", "folio_inicial", "desde"] },
      { field: "folioTo", aliases: ["folio final", "folio_final", "hasta"] },
      { field: "net", aliases: NET },
      { field: "exempt", aliases: EXEMPT },
      { field: "total", aliases: TOTAL },
    ],
  },
};
