/**
 * A store-level fault (I/O, locked file, constraint other than the debtor
 * code). The operation did not commit.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/**
 * The debtor code was taken between generation and insert. Callers pick a
 * new code and try again.
 */
export class DuplicateDebtCodeError extends PersistenceError {
  constructor(public readonly debtorCode: string, options?: { cause?: unknown }) {
    super(`Debtor code "${debtorCode}" already exists`, options);
    this.name = "DuplicateDebtCodeError";
  }
}

/**
 * SQLite error code carried by better-sqlite3's SqliteError, if any.
 */
export function sqliteErrorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}
