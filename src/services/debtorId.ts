import type { DebtRepository } from "../types/ledger";

const LETTERS = "abcdefghijklmnopqrstuvwxyz";
// No zero: it reads too much like "o" in some fonts
const DIGITS = "123456789";

export const DEBTOR_CODE_PATTERN = /^[a-z][1-9]{2}$/;
export const DEBTOR_CODE_SPACE = LETTERS.length * DIGITS.length * DIGITS.length;

/** Every possible code is already in use */
export class DebtorCodeSpaceExhaustedError extends Error {
  constructor() {
    super("Debtor code space exhausted");
    this.name = "DebtorCodeSpaceExhaustedError";
  }
}

function pick(alphabet: string, random: () => number): string {
  return alphabet[Math.floor(random() * alphabet.length)];
}

/**
 * Draw a debtor code not present in `existing`.
 *
 * Only a pre-check: another insert can take the same code before ours
 * lands, so the store's UNIQUE constraint has the final word.
 */
export function generateDebtorCode(
  existing: ReadonlySet<string>,
  random: () => number = Math.random
): string {
  if (existing.size >= DEBTOR_CODE_SPACE) {
    throw new DebtorCodeSpaceExhaustedError();
  }

  for (;;) {
    const code = pick(LETTERS, random) + pick(DIGITS, random) + pick(DIGITS, random);
    if (!existing.has(code)) return code;
  }
}

/**
 * Generate against a fresh snapshot of every code in the debt store.
 */
export async function nextDebtorCode(
  debts: DebtRepository,
  random: () => number = Math.random
): Promise<string> {
  const existing = await debts.listCodes();
  return generateDebtorCode(existing, random);
}
