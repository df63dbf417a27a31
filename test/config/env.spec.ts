import { describe, it, expect } from "vitest";
import { ConfigError, loadEnv } from "../../src/config/env";

describe("loadEnv", () => {
  it("applies defaults", () => {
    expect(loadEnv({ BOT_TOKEN: "test-token" })).toEqual({
      BOT_TOKEN: "test-token",
      ADMIN_ID: undefined,
      TRANSACTIONS_DB_PATH: "./data/accounting.db",
      DEBTS_DB_PATH: "./data/debt.db",
      SESSION_DB_PATH: "./data/session.db",
      SESSION_TTL_SECONDS: 1800,
      RATE_LIMIT_MAX_MESSAGES: 30,
      RATE_LIMIT_WINDOW_SECONDS: 60,
    });
  });

  it("coerces numeric variables", () => {
    const env = loadEnv({ BOT_TOKEN: "test-token", ADMIN_ID: "12345", SESSION_TTL_SECONDS: "600" });
    expect(env.ADMIN_ID).toBe(12345);
    expect(env.SESSION_TTL_SECONDS).toBe(600);
  });

  it("treats an empty ADMIN_ID as unset", () => {
    expect(loadEnv({ BOT_TOKEN: "test-token", ADMIN_ID: "" }).ADMIN_ID).toBeUndefined();
  });

  it("lists every invalid variable", () => {
    try {
      loadEnv({ ADMIN_ID: "abc", RATE_LIMIT_MAX_MESSAGES: "0" });
      expect.fail("loadEnv should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues.map((i) => i.split(":")[0])).toEqual([
        "BOT_TOKEN",
        "ADMIN_ID",
        "RATE_LIMIT_MAX_MESSAGES",
      ]);
    }
  });
});
