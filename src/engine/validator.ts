// Advisory consistency checks over an assembled ledger. Nothing here blocks
// ledger production; every finding is returned as a warning.

import type { Ledger, LedgerEntry, ValidationWarning } from "../types/canonical";

// Rounding slack between basis and flow, in currency units.
export const BASIS_TOLERANCE = 1;

function duplicateKey(entry: LedgerEntry): string {
  return JSON.stringify([entry.documentNumber, entry.documentType, entry.operationKind]);
}

export function findDuplicates(ledger: Ledger): ValidationWarning[] {
  const groups = new Map<string, LedgerEntry[]>();
  for (const entry of ledger.entries) {
    if (entry.operationKind === "OPENING") continue;
    const key = duplicateKey(entry);
    const group = groups.get(key);
    if (group) group.push(entry);
    else groups.set(key, [entry]);
  }

  const warnings: ValidationWarning[] = [];
  for (const group of groups.values()) {
    const [first] = group;
    if (!first || group.length < 2) continue;
    const correlatives = group.map((e) => e.correlative);
    warnings.push({
      code: "duplicate",
      message: `Possible duplicate document ${first.documentNumber || "(no number)"} (type ${first.documentType}) at correlatives ${correlatives.join(", ")}`,
      correlatives,
    });
  }
  return warnings;
}

export function findBasisExceedsFlow(ledger: Ledger): ValidationWarning[] {
  return ledger.entries
    .filter((e) => e.taxBasisAmount > e.flowAmount + BASIS_TOLERANCE)
    .map((e) => ({
      code: "basis-exceeds-flow" as const,
      message: `Tax basis ${e.taxBasisAmount} exceeds total ${e.flowAmount} at correlative ${e.correlative}`,
      correlatives: [e.correlative],
    }));
}

export function findCorrelativeGaps(ledger: Ledger): ValidationWarning[] {
  const irregular = ledger.entries
    .filter((e, index) => e.correlative !== index + 1)
    .map((e) => e.correlative);
  if (irregular.length === 0) return [];
  return [
    {
      code: "correlative-gap",
      message: `Correlative sequence is not 1..${ledger.entries.length}: irregular values ${irregular.join(", ")}`,
      correlatives: irregular,
    },
  ];
}

export function findOpeningMisplacement(ledger: Ledger): ValidationWarning[] {
  const openings = ledger.entries.filter((e) => e.operationKind === "OPENING");
  const first = ledger.entries[0];
  if (openings.length === 1 && first?.operationKind === "OPENING") return [];
  return [
    {
      code: "opening-position",
      message: `Expected exactly one opening record in first position, found ${openings.length}`,
      correlatives: openings.map((e) => e.correlative),
    },
  ];
}

export function validateLedger(ledger: Ledger): ValidationWarning[] {
  return [
    ...findDuplicates(ledger),
    ...findBasisExceedsFlow(ledger),
    ...findCorrelativeGaps(ledger),
    ...findOpeningMisplacement(ledger),
  ];
}
