import { describe, it, expect, beforeEach } from "vitest";
import Database from "better-sqlite3";
import { createDebtRepository } from "../../src/db/repository-debt";
import { DuplicateDebtCodeError, PersistenceError } from "../../src/db/errors";
import type { DebtRepository, NewDebt } from "../../src/types/ledger";
import { FIXED_NOW } from "../helpers";

function draft(overrides: Partial<NewDebt> = {}): NewDebt {
  return {
    debtorCode: "b47",
    debtorName: "Alice",
    amount: 10000,
    description: null,
    recordedAt: FIXED_NOW,
    ownerId: 42,
    ...overrides,
  };
}

describe("debt repository (SQLite)", () => {
  let repo: DebtRepository;

  beforeEach(() => {
    repo = createDebtRepository(new Database(":memory:"));
  });

  it("round-trips a debt with and without a description", async () => {
    expect(await repo.create(draft())).toEqual(draft());
    expect(await repo.create(draft({ debtorCode: "c11", description: "lunch" }))).toEqual(
      draft({ debtorCode: "c11", description: "lunch" })
    );
  });

  it("rejects a duplicate code with DuplicateDebtCodeError", async () => {
    await repo.create(draft());

    const attempt = repo.create(draft({ debtorName: "Bob", ownerId: 7 }));
    await expect(attempt).rejects.toBeInstanceOf(DuplicateDebtCodeError);
    await expect(repo.create(draft())).rejects.toMatchObject({ debtorCode: "b47" });
  });

  it("lists codes across every owner", async () => {
    await repo.create(draft());
    await repo.create(draft({ debtorCode: "z99", ownerId: 7 }));

    expect(await repo.listCodes()).toEqual(new Set(["b47", "z99"]));
  });

  it("matches codes case-sensitively and per owner", async () => {
    await repo.create(draft());

    expect(await repo.findById(42, "B47")).toBeNull();
    expect(await repo.deleteById(7, "b47")).toBeNull();
    expect(await repo.deleteById(42, "b47")).toEqual(draft());
    expect(await repo.listByOwner(42)).toEqual([]);
  });

  it("wraps other constraint failures as plain PersistenceError", async () => {
    const error = await repo.create(draft({ amount: -5 })).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).not.toBeInstanceOf(DuplicateDebtCodeError);
  });
});
