// ── Transaction ──
export interface Transaction {
  id: number;
  amount: number;
  description: string;
  isIncome: boolean;
  recordedAt: Date;
  ownerId: number;
}

export type NewTransaction = Omit<Transaction, "id">;

// ── Debt ──
export interface Debt {
  /** Format: one lowercase letter + two digits 1-9, e.g. "b47" */
  debtorCode: string;
  debtorName: string;
  amount: number;
  description: string | null;
  recordedAt: Date;
  ownerId: number;
}

export type NewDebt = Debt;

/**
 * CRUD over one ledger. Every operation the bot uses is scoped by the
 * requesting user; a record owned by someone else reads as not found.
 */
export interface LedgerRepository<TRecord, TKey, TDraft> {
  create(draft: TDraft): Promise<TRecord>;
  /** Insertion order */
  listByOwner(ownerId: number): Promise<TRecord[]>;
  findById(ownerId: number, id: TKey): Promise<TRecord | null>;
  /** Returns the deleted record, or null if nothing matched */
  deleteById(ownerId: number, id: TKey): Promise<TRecord | null>;
  /** Without an owner, wipes the whole store */
  deleteAll(ownerId?: number): Promise<number>;
}

export type TransactionRepository = LedgerRepository<Transaction, number, NewTransaction>;

export interface DebtRepository extends LedgerRepository<Debt, string, NewDebt> {
  /** Every code in the store, across all owners */
  listCodes(): Promise<Set<string>>;
}

// ── Summaries ──
export interface TransactionSummary {
  totalIncome: number;
  totalExpense: number;
  balance: number;
  recent: Transaction[];
  count: number;
}

export interface DebtListing {
  total: number;
  debts: Debt[];
}
