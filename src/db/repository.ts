import type Database from "better-sqlite3";
import { withStore } from "./database";
import type { NewTransaction, Transaction, TransactionRepository } from "../types/ledger";

const TRANSACTIONS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS transactions (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    amount      REAL    NOT NULL CHECK (amount > 0),
    description TEXT    NOT NULL,
    is_income   INTEGER NOT NULL,
    recorded_at TEXT    NOT NULL,
    user_id     INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_transactions_user ON transactions (user_id);
`;

interface TransactionRow {
  id: number;
  amount: number;
  description: string;
  is_income: number;
  recorded_at: string;
  user_id: number;
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    amount: row.amount,
    description: row.description,
    isIncome: row.is_income === 1,
    recordedAt: new Date(row.recorded_at),
    ownerId: row.user_id,
  };
}

// ── TRANSACTIONS ──
export function createTransactionRepository(db: Database.Database): TransactionRepository {
  db.exec(TRANSACTIONS_SCHEMA);

  return {
    create: (draft: NewTransaction) =>
      withStore("insertTransaction", () => {
        const row = db
          .prepare<[number, string, number, string, number], TransactionRow>(
            `INSERT INTO transactions (amount, description, is_income, recorded_at, user_id)
             VALUES (?, ?, ?, ?, ?) RETURNING *`
          )
          .get(
            draft.amount,
            draft.description,
            draft.isIncome ? 1 : 0,
            draft.recordedAt.toISOString(),
            draft.ownerId
          );
        if (!row) throw new Error("INSERT returned no row");
        return toTransaction(row);
      }),

    listByOwner: (ownerId: number) =>
      withStore("listTransactions", () =>
        db
          .prepare<[number], TransactionRow>(
            "SELECT * FROM transactions WHERE user_id = ? ORDER BY id"
          )
          .all(ownerId)
          .map(toTransaction)
      ),

    findById: (ownerId: number, id: number) =>
      withStore("findTransaction", () => {
        const row = db
          .prepare<[number, number], TransactionRow>(
            "SELECT * FROM transactions WHERE id = ? AND user_id = ?"
          )
          .get(id, ownerId);
        return row ? toTransaction(row) : null;
      }),

    deleteById: (ownerId: number, id: number) =>
      withStore("deleteTransaction", () => {
        const row = db
          .prepare<[number, number], TransactionRow>(
            "DELETE FROM transactions WHERE id = ? AND user_id = ? RETURNING *"
          )
          .get(id, ownerId);
        return row ? toTransaction(row) : null;
      }),

    deleteAll: (ownerId?: number) =>
      withStore("deleteAllTransactions", () => {
        const result =
          ownerId === undefined
            ? db.prepare("DELETE FROM transactions").run()
            : db.prepare<[number]>("DELETE FROM transactions WHERE user_id = ?").run(ownerId);
        return result.changes;
      }),
  };
}
