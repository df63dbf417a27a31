import type {
  NewTransaction,
  Transaction,
  TransactionRepository,
  TransactionSummary,
} from "../types/ledger";

const RECENT_LIMIT = 5;

export async function recordTransaction(
  repo: TransactionRepository,
  draft: NewTransaction
): Promise<Transaction> {
  const saved = await repo.create(draft);
  console.log(
    `[Ledger] Transaction #${saved.id} (${saved.isIncome ? "income" : "expense"}) recorded for user ${saved.ownerId}`
  );
  return saved;
}

/**
 * Totals over every transaction plus the most recently dated few.
 * balance = income - expense, and may go negative.
 */
export function summarizeTransactions(transactions: Transaction[]): TransactionSummary {
  let totalIncome = 0;
  let totalExpense = 0;

  for (const t of transactions) {
    if (t.isIncome) totalIncome += t.amount;
    else totalExpense += t.amount;
  }

  const recent = [...transactions]
    .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime() || b.id - a.id)
    .slice(0, RECENT_LIMIT);

  return {
    totalIncome,
    totalExpense,
    balance: totalIncome - totalExpense,
    recent,
    count: transactions.length,
  };
}

export async function getSummary(
  repo: TransactionRepository,
  ownerId: number
): Promise<TransactionSummary> {
  return summarizeTransactions(await repo.listByOwner(ownerId));
}

export async function deleteTransaction(
  repo: TransactionRepository,
  ownerId: number,
  id: number
): Promise<Transaction | null> {
  const deleted = await repo.deleteById(ownerId, id);
  if (deleted) {
    console.log(`[Ledger] Transaction #${id} deleted by user ${ownerId}`);
  }
  return deleted;
}

/**
 * Wipe the caller's transactions only; other users' ledgers are untouched.
 */
export async function deleteAllTransactions(
  repo: TransactionRepository,
  ownerId: number
): Promise<number> {
  const count = await repo.deleteAll(ownerId);
  console.log(`[Ledger] ${count} transactions deleted by user ${ownerId}`);
  return count;
}
