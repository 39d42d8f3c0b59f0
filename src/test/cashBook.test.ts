import { describe, it, expect } from "vitest";
import { applyCashBookEdits, generateCashBook } from "../pipeline/cashBook";
import type { CashBookSources } from "../pipeline/ingest";
import { NoUsableInputError } from "../types/errors";
import { NOW, PURCHASE_HEADER, SALES_HEADER, SUMMARY_HEADER, csvFile } from "./helpers";

const sources: CashBookSources = {
  salesDetail: [
    csvFile("ventas_2024-03.csv", [
      SALES_HEADER,
      "1;33;76.111.111-1;Cliente Uno;1001;05/03/2024;0;100.000;19.000;119.000",
      "2;61;76.111.111-1;Cliente Uno;55;10/03/2024;0;10.000;1.900;11.900",
    ]),
  ],
  salesSummary: [csvFile("resumen_ventas_202403.csv", [SUMMARY_HEADER, "Boleta Electrónica(39);120;0;50.000;9.500;59.500"])],
  purchaseDetail: [
    csvFile("compras_2024-03.csv", [
      PURCHASE_HEADER,
      "1;33;Del Giro;96.555.555-5;Proveedor SA;8001;07/03/2024;08/03/2024;0;100.000;19.000;0;119.000",
    ]),
  ],
  manualPayments: [
    "Tipo,N° Documento,Tipo Documento,Fecha,Glosa,Monto",
    '2,15,Comprobante,15/03/2024,Pago arriendo,"$151,077"',
  ].join("\n"),
  professionalFees:
    '2,301,Boleta de Honorarios,12.345.678-9,20/03/2024,Persona Prueba,"$862,500","$1,000,000"',
};

const settings = { period: "2024", openingAmount: 0, companyTaxId: "76.000.000-0" };

describe("generateCashBook", () => {
  const cashBook = generateCashBook(sources, settings, { now: NOW });

  it("orders every source chronologically behind the opening record", () => {
    expect(cashBook.ledger.entries.map((e) => [e.correlative, e.id])).toEqual([
      [1, "opening"],
      [2, "sales-detail:0:2"],
      [3, "purchase-detail:0:2"],
      [4, "sales-detail:0:3"],
      [5, "manual-payment:0:2"],
      [6, "professional-fee:0:1"],
      [7, "sales-summary:0:2"],
    ]);
    expect(cashBook.ledger.entries[0]).toMatchObject({
      operationKind: "OPENING",
      operationDate: new Date(2024, 0, 1),
      counterpartyId: "76.000.000-0",
    });
    expect(cashBook.revision).toBe(1);
  });

  it("computes totals over the whole ledger", () => {
    expect(cashBook.totals).toEqual({
      totalIncomeFlow: 178500,
      totalExpenseFlow: 1144477,
      netFlow: -965977,
      incomeBasis: 150000,
      expenseBasis: 1110000,
      netBasisResult: -960000,
    });
  });

  it("reports the withheld fee as an advisory finding", () => {
    expect(cashBook.validation).toEqual([
      {
        code: "basis-exceeds-flow",
        message: "Tax basis 1000000 exceeds total 862500 at correlative 6",
        correlatives: [6],
      },
    ]);
  });

  it("keeps an informational warning for inferred dates", () => {
    expect(cashBook.importWarnings).toEqual([
      {
        source: "resumen_ventas_202403.csv",
        severity: "info",
        element: "row 2",
        message: "date inferred from filename: 2024-03-31",
      },
    ]);
  });
});

describe("applyCashBookEdits", () => {
  const cashBook = generateCashBook(sources, settings, { now: NOW });

  it("shifts income totals by exactly the new opening amount", () => {
    const edited = applyCashBookEdits(cashBook, [{ type: "opening-amount", amount: 500000 }]);
    expect(edited.revision).toBe(2);
    expect(edited.totals.totalIncomeFlow).toBe(678500);
    expect(edited.totals.netFlow).toBe(-465977);
    expect(edited.totals.netBasisResult).toBe(cashBook.totals.netBasisResult);
    expect(edited.ledger.entries.map((e) => e.id)).toEqual(cashBook.ledger.entries.map((e) => e.id));
    expect(cashBook.totals.totalIncomeFlow).toBe(178500);
  });

  it("moves an edited record and renumbers", () => {
    const edited = applyCashBookEdits(cashBook, [
      { type: "operation-date", recordId: "sales-summary:0:2", date: new Date(2024, 2, 6) },
    ]);
    expect(edited.ledger.entries.map((e) => e.id).slice(0, 4)).toEqual([
      "opening",
      "sales-detail:0:2",
      "sales-summary:0:2",
      "purchase-detail:0:2",
    ]);
    expect(edited.validation.map((w) => w.correlatives)).toEqual([[7]]);
  });
});

describe("failure handling", () => {
  const broken: CashBookSources = {
    salesDetail: [csvFile("otro.csv", ["Columna A;Columna B", "1;2"])],
    purchaseDetail: [{ name: "vacio.csv", bytes: new Uint8Array(0) }],
  };

  it("isolates unreadable files", () => {
    const cashBook = generateCashBook({ ...sources, ...broken }, settings, { now: NOW });
    expect(cashBook.ledger.entries).toHaveLength(4);
    expect(cashBook.importWarnings.filter((w) => w.severity === "fatal")).toEqual([
      {
        source: "otro.csv",
        severity: "fatal",
        element: "file",
        message: "Unrecognized columns in otro.csv: missing documentType, date (found: Columna A, Columna B)",
      },
      {
        source: "vacio.csv",
        severity: "fatal",
        element: "file",
        message: "Could not read vacio.csv: file is empty",
      },
    ]);
  });

  it("throws when nothing usable remains", () => {
    let caught: unknown;
    try {
      generateCashBook(broken, settings, { now: NOW });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NoUsableInputError);
    if (caught instanceof NoUsableInputError) {
      expect(caught.warnings.map((w) => w.source)).toEqual(["otro.csv", "vacio.csv"]);
    }
  });

  it("replaces a negative opening amount with 0 and warns", () => {
    const cashBook = generateCashBook(sources, { period: "2024", openingAmount: -5 }, { now: NOW });
    expect(cashBook.ledger.entries[0]?.flowAmount).toBe(0);
    expect(cashBook.importWarnings).toContainEqual({
      source: "settings",
      severity: "warn",
      element: "openingAmount",
      message: "Opening amount -5 is not a non-negative number; using 0",
    });
  });

  it("warns about rows left without a date when fallbacks are disabled", () => {
    const cashBook = generateCashBook(
      {
        salesDetail: [
          csvFile("ventas_2024-03.csv", [
            SALES_HEADER,
            "1;33;1-9;Cliente;10;;0;1.000;190;1.190",
            "2;33;1-9;Cliente;11;02/03/2024;0;1.000;190;1.190",
          ]),
        ],
      },
      settings,
      { now: NOW, dateFallbacks: [] }
    );
    expect(cashBook.ledger.entries.map((e) => e.documentNumber)).toEqual(["", "11"]);
    expect(cashBook.importWarnings).toEqual([
      { source: "ventas_2024-03.csv", severity: "warn", element: "row 2", message: 'no usable operation date ("")' },
    ]);
  });

  it("reports the source line of a row that follows a blank line", () => {
    const cashBook = generateCashBook(
      {
        salesDetail: [
          csvFile("ventas_2024-03.csv", [
            SALES_HEADER,
            "1;33;1-9;Cliente;11;02/03/2024;0;1.000;190;1.190",
            "",
            "2;33;1-9;Cliente;12;;0;1.000;190;1.190",
          ]),
        ],
      },
      settings,
      { now: NOW, dateFallbacks: [] }
    );
    expect(cashBook.ledger.entries.map((e) => e.id)).toEqual(["opening", "sales-detail:0:2"]);
    expect(cashBook.importWarnings).toEqual([
      { source: "ventas_2024-03.csv", severity: "warn", element: "row 4", message: 'no usable operation date ("")' },
    ]);
  });

  it("accepts extra header aliases", () => {
    const cashBook = generateCashBook(
      { salesDetail: [csvFile("ventas.csv", ["Clase;Numero;Dia;Valor", "33;9;04/01/2024;1.190"])] },
      settings,
      {
        now: NOW,
        extraAliases: { "sales-detail": { documentType: ["Clase"], folio: ["Numero"], date: ["Dia"], total: ["Valor"] } },
      }
    );
    expect(cashBook.ledger.entries[1]).toMatchObject({
      documentNumber: "9",
      operationDate: new Date(2024, 0, 4),
      flowAmount: 1190,
      taxBasisAmount: 0,
    });
  });
});
