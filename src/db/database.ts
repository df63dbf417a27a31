import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { PersistenceError } from "./errors";

/**
 * Open (and create, if needed) a SQLite file. Each ledger gets its own file,
 * so the stores stay independent.
 */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ":memory:") {
    mkdirSync(dirname(filename), { recursive: true });
  }
  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  return db;
}

/**
 * Run a store operation, logging and wrapping any fault as PersistenceError.
 * Errors that are already PersistenceError pass through untouched.
 */
export async function withStore<T>(operation: string, run: () => T): Promise<T> {
  try {
    return run();
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    console.error(`[Ledger] ${operation} failed:`, error);
    throw new PersistenceError(`${operation} failed`, { cause: error });
  }
}
