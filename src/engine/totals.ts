import type { Ledger, Totals } from "../types/canonical";

// Opening balance counts on the income side: it is cash available in the period.
export function computeTotals(ledger: Ledger): Totals {
  let totalIncomeFlow = 0;
  let totalExpenseFlow = 0;
  let incomeBasis = 0;
  let expenseBasis = 0;

  for (const entry of ledger.entries) {
    if (entry.operationKind === "EXPENSE") {
      totalExpenseFlow += entry.flowAmount;
      expenseBasis += entry.taxBasisAmount;
    } else {
      totalIncomeFlow += entry.flowAmount;
      incomeBasis += entry.taxBasisAmount;
    }
  }

  return {
    totalIncomeFlow,
    totalExpenseFlow,
    netFlow: totalIncomeFlow - totalExpenseFlow,
    incomeBasis,
    expenseBasis,
    netBasisResult: incomeBasis - expenseBasis,
  };
}
