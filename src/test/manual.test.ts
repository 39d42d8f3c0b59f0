import { describe, it, expect } from "vitest";
import { parseManualEntries, parseOperationCode } from "../manual/parser";

describe("parseOperationCode", () => {
  it("accepts numeric and spelled-out kinds", () => {
    expect(parseOperationCode("1")).toBe("INCOME");
    expect(parseOperationCode(" Egreso ")).toBe("EXPENSE");
    expect(parseOperationCode("0")).toBeUndefined();
  });
});

describe("parseManualEntries (generic payments)", () => {
  const outcomes = parseManualEntries(
    [
      "Tipo,N° Documento,Tipo Documento,Fecha,Glosa,Monto",
      '2,15,Comprobante,15/06/2024,Pago arriendo junio,"$151,077"',
      "1,16,Comprobante,20/06/2024,Aporte socio,1.000.000",
      "",
      "2,17,Comprobante,99/99/2024,Fecha mala,100",
      "2,18,Comprobante,21/06/2024,Monto malo,abc",
      "2,19,Comprobante,21/06/2024",
      "2,20,Comprobante,22/06/2024,Sin monto,0",
    ].join("\n"),
    "generic-payment"
  );

  it("skips the header line silently", () => {
    expect(outcomes[0]).toEqual({ ok: false, rowNumber: 1, reason: "header-line", silent: true, message: "header line" });
  });

  it("keeps a quoted amount with thousands commas in one field", () => {
    expect(outcomes[1]).toEqual({
      ok: true,
      rowNumber: 2,
      record: {
        operationKind: "EXPENSE",
        documentNumber: "15",
        documentType: "Comprobante",
        origin: "manual-payment",
        dateSource: "row",
        sourceName: "generic-payment",
        counterpartyId: "",
        operationDate: new Date(2024, 5, 15),
        description: "Pago arriendo junio",
        flowAmount: 151077,
        taxBasisAmount: 0,
      },
    });
  });

  it("reads income lines", () => {
    expect(outcomes[2]).toMatchObject({ ok: true, rowNumber: 3, record: { operationKind: "INCOME", flowAmount: 1000000 } });
  });

  it("reports bad lines with their line numbers", () => {
    expect(outcomes.slice(3, 6)).toEqual([
      { ok: false, rowNumber: 5, reason: "malformed-line", silent: false, message: 'invalid date "99/99/2024"' },
      { ok: false, rowNumber: 6, reason: "malformed-line", silent: false, message: 'invalid amount "abc"' },
      { ok: false, rowNumber: 7, reason: "malformed-line", silent: false, message: "expected 6 fields, found 4" },
    ]);
  });

  it("drops zero amounts silently", () => {
    expect(outcomes[6]).toMatchObject({ ok: false, rowNumber: 8, reason: "zero-total", silent: true });
    expect(outcomes).toHaveLength(7);
  });
});

describe("parseManualEntries (professional fees)", () => {
  it("uses the paid amount as flow and the gross fee as basis", () => {
    const [outcome] = parseManualEntries(
      '2,301,Boleta de Honorarios,12.345.678-9,30/06/2024,Persona Prueba,"$862,500","$1,000,000"',
      "professional-fee",
      "professional fees"
    );
    expect(outcome).toEqual({
      ok: true,
      rowNumber: 1,
      record: {
        operationKind: "EXPENSE",
        documentNumber: "301",
        documentType: "Boleta de Honorarios",
        origin: "professional-fee",
        dateSource: "row",
        sourceName: "professional fees",
        counterpartyId: "12.345.678-9",
        operationDate: new Date(2024, 5, 30),
        description: "Boleta de Honorarios - Persona Prueba",
        flowAmount: 862500,
        taxBasisAmount: 1000000,
      },
    });
  });

  it("rejects the opening kind and bad amounts", () => {
    const outcomes = parseManualEntries(
      [
        "2,1,Boleta de Honorarios,1-9,01/06/2024,Persona Prueba,900,1000",
        "0,2,Boleta de Honorarios,1-9,01/06/2024,Persona Prueba,900,1000",
        "2,3,Boleta de Honorarios,1-9,01/06/2024,Persona Prueba,900,mil",
      ].join("\n"),
      "professional-fee"
    );
    expect(outcomes.map((o) => (o.ok ? "ok" : o.message))).toEqual([
      "ok",
      'unknown operation kind "0" (expected 1 or 2)',
      'invalid gross amount "mil"',
    ]);
  });

  it("reports unreadable lines and carries on", () => {
    const outcomes = parseManualEntries(
      ['2,4,Boleta,1-9,01/06/2024,"Persona', "2,5,Boleta,1-9,02/06/2024,Persona Prueba,900,1000"].join("\n"),
      "professional-fee"
    );
    expect(outcomes[0]).toMatchObject({
      ok: false,
      rowNumber: 1,
      reason: "malformed-line",
      silent: false,
      message: expect.stringMatching(/^unreadable line: /),
    });
    expect(outcomes[1]).toMatchObject({ ok: true, rowNumber: 2, record: { documentNumber: "5" } });
  });
});
