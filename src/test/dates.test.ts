import { describe, it, expect } from "vitest";
import {
  ALL_DATE_FALLBACKS,
  collectSiblingDates,
  dateFromFileName,
  formatIsoDate,
  periodYearEnd,
  resolveOperationDate,
  type DateContext,
} from "../engine/dates";

const context = (overrides: Partial<DateContext> = {}): DateContext => ({
  fileName: "ventas_2024-11.csv",
  period: "2024",
  now: new Date(2026, 5, 1),
  fallbacks: ALL_DATE_FALLBACKS,
  siblingDates: new Map([["33:500", new Date(2024, 3, 15)]]),
  ...overrides,
});

describe("dateFromFileName", () => {
  it("returns the last day of the named month", () => {
    expect(dateFromFileName("ventas_2024-11.csv")).toEqual(new Date(2024, 10, 30));
    expect(dateFromFileName("compras202312.csv")).toEqual(new Date(2023, 11, 31));
  });

  it("handles leap years", () => {
    expect(dateFromFileName("RCV_202402_76123456.csv")).toEqual(new Date(2024, 1, 29));
  });

  it("takes the last plausible match", () => {
    expect(dateFromFileName("resumen_2023-05_2024-01.csv")).toEqual(new Date(2024, 0, 31));
  });

  it("ignores implausible years and months", () => {
    expect(dateFromFileName("boletas_1999-12.csv")).toBeUndefined();
    expect(dateFromFileName("ventas_2024-13.csv")).toBeUndefined();
    expect(dateFromFileName("resumen.csv")).toBeUndefined();
  });
});

describe("periodYearEnd", () => {
  it("accepts 4-digit years only", () => {
    expect(periodYearEnd("2024")).toEqual(new Date(2024, 11, 31));
    expect(periodYearEnd(" 2023 ")).toEqual(new Date(2023, 11, 31));
    expect(periodYearEnd("24")).toBeUndefined();
    expect(periodYearEnd("")).toBeUndefined();
  });
});

describe("collectSiblingDates", () => {
  it("keeps the first parsable date per key and ignores blank keys", () => {
    const dates = collectSiblingDates([
      { key: "33:1", dateCell: "" },
      { key: "33:1", dateCell: "02/01/2024" },
      { key: "33:1", dateCell: "03/01/2024" },
      { key: "", dateCell: "04/01/2024" },
    ]);
    expect([...dates.entries()]).toEqual([["33:1", new Date(2024, 0, 2)]]);
  });
});

describe("resolveOperationDate", () => {
  it("prefers the row's own date", () => {
    expect(resolveOperationDate("05/03/2024", "33:500", context())).toEqual({
      date: new Date(2024, 2, 5),
      source: "row",
    });
  });

  it("borrows the date of a sibling row", () => {
    expect(resolveOperationDate("", "33:500", context())).toEqual({
      date: new Date(2024, 3, 15),
      source: "sibling",
    });
  });

  it("falls back to the file name", () => {
    expect(resolveOperationDate("", "33:999", context())).toEqual({
      date: new Date(2024, 10, 30),
      source: "filename",
    });
  });

  it("falls back to the period year end", () => {
    expect(resolveOperationDate("??", "", context({ fileName: "ventas.csv" }))).toEqual({
      date: new Date(2024, 11, 31),
      source: "period",
    });
  });

  it("falls back to the current year end", () => {
    expect(resolveOperationDate("", "", context({ fileName: "ventas.csv", period: "" }))).toEqual({
      date: new Date(2026, 11, 31),
      source: "current-year",
    });
  });

  it("skips disabled steps and can give up", () => {
    const ctx = context({ fallbacks: ["period"] });
    expect(resolveOperationDate("", "33:500", ctx)).toEqual({ date: new Date(2024, 11, 31), source: "period" });
    expect(resolveOperationDate("", "33:500", context({ fallbacks: [] }))).toBeUndefined();
  });
});

describe("formatIsoDate", () => {
  it("formats local calendar dates", () => {
    expect(formatIsoDate(new Date(2024, 2, 5))).toBe("2024-03-05");
  });
});
