import { z } from "zod";

const optionalInt = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.coerce.number().int().optional()
);

const envSchema = z.object({
  BOT_TOKEN: z.string().min(1, { message: "BOT_TOKEN is required" }),
  /** Optional: Telegram user that gets notified of unhandled bot errors */
  ADMIN_ID: optionalInt,

  TRANSACTIONS_DB_PATH: z.string().default("./data/accounting.db"),
  DEBTS_DB_PATH: z.string().default("./data/debt.db"),
  /** Conversation sessions and rate-limit counters */
  SESSION_DB_PATH: z.string().default("./data/session.db"),

  SESSION_TTL_SECONDS: z.coerce.number().int().min(60).default(1800),

  RATE_LIMIT_MAX_MESSAGES: z.coerce.number().int().min(1).default(30),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().min(1).default(60),
});

export type Env = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Parse and validate the environment. Throws ConfigError listing every
 * offending variable so the entry point can print them all at once.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}
