import { DuplicateDebtCodeError } from "../db/errors";
import { nextDebtorCode } from "./debtorId";
import type { Debt, DebtListing, DebtRepository, NewDebt } from "../types/ledger";

/** Insert attempts before a code collision is reported as a failure */
export const MAX_CODE_ATTEMPTS = 5;

/**
 * Insert a debt under the code the user was shown. If another debt took
 * that code in the meantime, draw a new one and retry; the saved record
 * carries whichever code actually landed.
 */
export async function recordDebt(
  repo: DebtRepository,
  draft: NewDebt,
  random: () => number = Math.random
): Promise<Debt> {
  let debtorCode = draft.debtorCode;

  for (let attempt = 1; ; attempt++) {
    try {
      const saved = await repo.create({ ...draft, debtorCode });
      console.log(`[Ledger] Debt ${saved.debtorCode} recorded for user ${saved.ownerId}`);
      return saved;
    } catch (error) {
      if (!(error instanceof DuplicateDebtCodeError) || attempt >= MAX_CODE_ATTEMPTS) {
        throw error;
      }
      console.warn(
        `[Ledger] Debtor code ${debtorCode} taken (attempt ${attempt}/${MAX_CODE_ATTEMPTS}), regenerating`
      );
      debtorCode = await nextDebtorCode(repo, random);
    }
  }
}

export async function getDebtList(repo: DebtRepository, ownerId: number): Promise<DebtListing> {
  const debts = await repo.listByOwner(ownerId);
  const total = debts.reduce((sum, d) => sum + d.amount, 0);
  return { total, debts };
}

/**
 * Delete the caller's debt with this code. Surrounding whitespace is
 * ignored; case is not.
 */
export async function deleteDebtByCode(
  repo: DebtRepository,
  ownerId: number,
  rawCode: string
): Promise<Debt | null> {
  const debtorCode = rawCode.trim();
  const deleted = await repo.deleteById(ownerId, debtorCode);
  if (deleted) {
    console.log(`[Ledger] Debt ${debtorCode} deleted by user ${ownerId}`);
  }
  return deleted;
}
