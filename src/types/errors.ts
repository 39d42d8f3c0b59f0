import type { ImportWarning } from "./canonical";

export type CashBookErrorCode =
  | "DECODE"
  | "MAPPING"
  | "NO_USABLE_INPUT"
  | "LEDGER_EDIT";

export class CashBookError extends Error {
  readonly code: CashBookErrorCode;

  constructor(code: CashBookErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No encoding in the priority list produced a data row. */
export class DecodeError extends CashBookError {
  constructor(readonly fileName: string, reason: string) {
    super("DECODE", `Could not read ${fileName}: ${reason}`);
  }
}

/** Required canonical columns are missing from the header row. */
export class MappingError extends CashBookError {
  constructor(readonly fileName: string, readonly missing: string[], readonly headers: string[]) {
    super(
      "MAPPING",
      `Unrecognized columns in ${fileName}: missing ${missing.join(", ")} (found: ${headers.join(", ") || "none"})`
    );
  }
}

export class NoUsableInputError extends CashBookError {
  constructor(readonly warnings: ImportWarning[]) {
    super("NO_USABLE_INPUT", "No source produced a ledger record");
  }
}

export class LedgerEditError extends CashBookError {
  constructor(message: string) {
    super("LEDGER_EDIT", message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
