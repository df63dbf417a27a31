import Database from "better-sqlite3";
import { vi } from "vitest";
import { createSqliteKV } from "../src/db/kv";
import { createTransactionRepository } from "../src/db/repository";
import { createDebtRepository } from "../src/db/repository-debt";
import type { KeyValueStore } from "../src/db/kv";
import type { BotDeps } from "../src/types/deps";

/** 2024-03-20 11:30 in Tehran, i.e. 1403/01/01 */
export const FIXED_NOW = new Date("2024-03-20T08:00:00.000Z");
export const FIXED_SOLAR_DATE = "1403/01/01";

/**
 * Deterministic stand-in for Math.random: returns the given values in
 * order, wrapping around.
 */
export function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

/** Random values that make the debtor code generator draw "b47" */
export const B47 = [1.5 / 26, 3.5 / 9, 6.5 / 9];
/** ...and "c11" */
export const C11 = [2.5 / 26, 0.5 / 9, 0.5 / 9];

/**
 * Real repositories over in-memory SQLite, one database per store.
 */
export function createTestDeps(overrides: Partial<BotDeps> = {}): BotDeps {
  return {
    transactions: createTransactionRepository(new Database(":memory:")),
    debts: createDebtRepository(new Database(":memory:")),
    kv: createSqliteKV(new Database(":memory:")),
    sessionTtlSeconds: 1800,
    now: () => FIXED_NOW,
    random: sequence(B47),
    ...overrides,
  };
}

/**
 * Map-backed KV with spy methods. TTLs are recorded, not enforced.
 */
export function createMockKV() {
  const store = new Map<string, string>();
  const ttls = new Map<string, number | undefined>();
  const kv = {
    store,
    ttls,
    get: vi.fn(async (key: string) => store.get(key) ?? null),
    put: vi.fn(async (key: string, value: string, options?: { expirationTtl?: number }) => {
      store.set(key, value);
      ttls.set(key, options?.expirationTtl);
    }),
    delete: vi.fn(async (key: string) => {
      store.delete(key);
      ttls.delete(key);
    }),
  } satisfies KeyValueStore & { store: Map<string, string>; ttls: Map<string, number | undefined> };
  return kv;
}
