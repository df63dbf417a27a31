import type { KeyValueStore } from "../db/kv";
import type { DebtRepository, TransactionRepository } from "./ledger";

/**
 * Everything a handler needs, injected once at startup.
 */
export interface BotDeps {
  transactions: TransactionRepository;
  debts: DebtRepository;
  /** Conversation sessions and rate-limit counters */
  kv: KeyValueStore;
  sessionTtlSeconds: number;
  now: () => Date;
  /** Source for debtor codes; defaults to Math.random */
  random?: () => number;
}
