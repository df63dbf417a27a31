import type Database from "better-sqlite3";
import { withStore } from "./database";
import { DuplicateDebtCodeError, sqliteErrorCode } from "./errors";
import type { Debt, DebtRepository, NewDebt } from "../types/ledger";

// debtor_id is the natural key and must stay unique across every owner:
// the generator's pre-check can race, this constraint cannot.
const DEBTS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS debts (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    debtor_id   TEXT    NOT NULL UNIQUE,
    debtor_name TEXT    NOT NULL,
    amount      REAL    NOT NULL CHECK (amount > 0),
    description TEXT,
    recorded_at TEXT    NOT NULL,
    user_id     INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_debts_user ON debts (user_id);
`;

interface DebtRow {
  id: number;
  debtor_id: string;
  debtor_name: string;
  amount: number;
  description: string | null;
  recorded_at: string;
  user_id: number;
}

function toDebt(row: DebtRow): Debt {
  return {
    debtorCode: row.debtor_id,
    debtorName: row.debtor_name,
    amount: row.amount,
    description: row.description,
    recordedAt: new Date(row.recorded_at),
    ownerId: row.user_id,
  };
}

// ── DEBTS ──
export function createDebtRepository(db: Database.Database): DebtRepository {
  db.exec(DEBTS_SCHEMA);

  return {
    create: (draft: NewDebt) =>
      withStore("insertDebt", () => {
        try {
          const row = db
            .prepare<[string, string, number, string | null, string, number], DebtRow>(
              `INSERT INTO debts (debtor_id, debtor_name, amount, description, recorded_at, user_id)
               VALUES (?, ?, ?, ?, ?, ?) RETURNING *`
            )
            .get(
              draft.debtorCode,
              draft.debtorName,
              draft.amount,
              draft.description,
              draft.recordedAt.toISOString(),
              draft.ownerId
            );
          if (!row) throw new Error("INSERT returned no row");
          return toDebt(row);
        } catch (error) {
          if (sqliteErrorCode(error) === "SQLITE_CONSTRAINT_UNIQUE") {
            throw new DuplicateDebtCodeError(draft.debtorCode, { cause: error });
          }
          throw error;
        }
      }),

    listByOwner: (ownerId: number) =>
      withStore("listDebts", () =>
        db
          .prepare<[number], DebtRow>("SELECT * FROM debts WHERE user_id = ? ORDER BY id")
          .all(ownerId)
          .map(toDebt)
      ),

    // Codes are case-sensitive: "B47" never matches "b47"
    findById: (ownerId: number, debtorCode: string) =>
      withStore("findDebt", () => {
        const row = db
          .prepare<[string, number], DebtRow>(
            "SELECT * FROM debts WHERE debtor_id = ? AND user_id = ?"
          )
          .get(debtorCode, ownerId);
        return row ? toDebt(row) : null;
      }),

    deleteById: (ownerId: number, debtorCode: string) =>
      withStore("deleteDebt", () => {
        const row = db
          .prepare<[string, number], DebtRow>(
            "DELETE FROM debts WHERE debtor_id = ? AND user_id = ? RETURNING *"
          )
          .get(debtorCode, ownerId);
        return row ? toDebt(row) : null;
      }),

    deleteAll: (ownerId?: number) =>
      withStore("deleteAllDebts", () => {
        const result =
          ownerId === undefined
            ? db.prepare("DELETE FROM debts").run()
            : db.prepare<[number]>("DELETE FROM debts WHERE user_id = ?").run(ownerId);
        return result.changes;
      }),

    listCodes: () =>
      withStore("listDebtorCodes", () => {
        const rows = db
          .prepare<[], { debtor_id: string }>("SELECT debtor_id FROM debts")
          .all();
        return new Set(rows.map((r) => r.debtor_id));
      }),
  };
}
