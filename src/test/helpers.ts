import type { CanonicalRecord } from "../types/canonical";
import type { SourceFile } from "../pipeline/ingest";

export const NOW = new Date(2026, 0, 15);

export function csvFile(name: string, lines: string[], encoding: BufferEncoding = "utf8"): SourceFile {
  return { name, bytes: Buffer.from(lines.join("\n") + "\n", encoding) };
}

export function record(overrides: Partial<CanonicalRecord> & Pick<CanonicalRecord, "id" | "sequence">): CanonicalRecord {
  return {
    operationKind: "INCOME",
    documentNumber: overrides.id,
    documentType: 33,
    counterpartyId: "",
    operationDate: new Date(2024, 0, 10),
    description: "",
    flowAmount: 1000,
    taxBasisAmount: 800,
    origin: "sales-detail",
    dateSource: "row",
    sourceName: "test.csv",
    ...overrides,
  };
}

export const SALES_HEADER =
  "Nro;Tipo Doc;Rut cliente;Razon Social;Folio;Fecha Docto;Monto Exento;Monto Neto;Monto IVA;Monto total";

export const PURCHASE_HEADER =
  "Nro;Tipo Doc;Tipo Compra;RUT Proveedor;Razon Social;Folio;Fecha Docto;Fecha Recepcion;Monto Exento;Monto Neto;Monto IVA Recuperable;Monto Iva No Recuperable;Monto Total";

export const SUMMARY_HEADER = "Tipo Documento;Total Documentos;Monto Exento;Monto Neto;Monto IVA;Monto Total";
