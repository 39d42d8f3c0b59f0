import { createStore } from "zustand/vanilla";
import type { CashBook } from "../types/canonical";
import { CashBookError, describeError } from "../types/errors";
import type { LedgerEdit } from "../engine/ledger";
import type { IngestOptions, CashBookSources } from "../pipeline/ingest";
import { applyCashBookEdits, generateCashBook, type CashBookSettings } from "../pipeline/cashBook";

// Editing session. The cash book is only ever replaced as a whole: generate
// builds a fresh one, applyEdits derives the next revision from the current
// one. A failed action keeps the previous cash book and records the error.

interface CashBookState {
  cashBook: CashBook | null;
  error: string | null;

  generate: (sources: CashBookSources, settings: CashBookSettings, options?: IngestOptions) => CashBook | null;
  applyEdits: (edits: readonly LedgerEdit[]) => CashBook | null;
  clear: () => void;
}

export type CashBookStore = ReturnType<typeof createCashBookStore>;

export const createCashBookStore = () =>
  createStore<CashBookState>()((set, get) => {
    // Domain errors end up in state; anything else is a bug and propagates.
    const attempt = (build: () => CashBook): CashBook | null => {
      try {
        const cashBook = build();
        set({ cashBook, error: null });
        return cashBook;
      } catch (error) {
        if (!(error instanceof CashBookError)) throw error;
        console.warn(`[CashBook] ${describeError(error)}`);
        set({ error: error.message });
        return null;
      }
    };

    return {
      cashBook: null,
      error: null,

      generate: (sources, settings, options) =>
        attempt(() => {
          const previous = get().cashBook;
          const next = generateCashBook(sources, settings, options);
          return previous ? { ...next, revision: previous.revision + 1 } : next;
        }),

      applyEdits: (edits) => {
        const current = get().cashBook;
        if (!current) {
          set({ error: "Nothing to edit: generate the cash book first" });
          return null;
        }
        return attempt(() => applyCashBookEdits(current, edits));
      },

      clear: () => set({ cashBook: null, error: null }),
    };
  });
