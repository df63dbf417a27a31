/**
 * Toman Ledger Bot: Node.js entry point
 * Loads config, opens the three SQLite stores and starts long polling.
 */

import "dotenv/config";
import { createBot } from "./bot";
import { ConfigError, loadEnv } from "./config/env";
import type { Env } from "./config/env";
import { openDatabase } from "./db/database";
import { createSqliteKV } from "./db/kv";
import { createTransactionRepository } from "./db/repository";
import { createDebtRepository } from "./db/repository-debt";

function readEnv(): Env {
  try {
    return loadEnv();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error("[Config] Environment validation failed:");
      for (const issue of error.issues) console.error(`  - ${issue}`);
      console.error("Check .env.example for the expected variables");
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const env = readEnv();

  const transactionsDb = openDatabase(env.TRANSACTIONS_DB_PATH);
  const debtsDb = openDatabase(env.DEBTS_DB_PATH);
  const sessionDb = openDatabase(env.SESSION_DB_PATH);

  const kv = createSqliteKV(sessionDb);
  const purged = await kv.purgeExpired();
  if (purged > 0) console.log(`[Session] Purged ${purged} expired entries`);

  const bot = createBot(env, {
    transactions: createTransactionRepository(transactionsDb),
    debts: createDebtRepository(debtsDb),
    kv,
    sessionTtlSeconds: env.SESSION_TTL_SECONDS,
    now: () => new Date(),
  });

  const shutdown = (signal: string) => {
    console.log(`[Bot] ${signal} received, stopping`);
    bot.stop().catch((error: unknown) => console.error("[Bot] Stop failed:", error));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  try {
    await bot.start({
      onStart: (info) => console.log(`[Bot] @${info.username} is running (long polling)`),
    });
  } finally {
    transactionsDb.close();
    debtsDb.close();
    sessionDb.close();
    console.log("[Bot] Stores closed");
  }
}

main().catch((error: unknown) => {
  // Log and exit non-zero
  console.error("[Bot] Fatal error:", error);
  process.exit(1);
});
