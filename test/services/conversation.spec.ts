import { describe, it, expect, vi } from "vitest";
import { advanceConversation, menuReply, startFlow } from "../../src/services/conversation";
import { PersistenceError } from "../../src/db/errors";
import type { Session } from "../../src/types/conversation";
import type { TransactionRepository } from "../../src/types/ledger";
import {
  DEBT_CANCELLED,
  DEBT_DELETE_FAILED,
  DEBT_DESCRIPTION_PROMPT,
  DEBT_NOT_FOUND,
  DEBT_SAVE_FAILED,
  DESCRIPTION_PROMPT,
  INVALID_AMOUNT,
  OPERATION_CANCELLED,
  TRANSACTION_CANCELLED,
  TRANSACTION_SAVE_FAILED,
  UNKNOWN_COMMAND_IN_FLOW,
  formatDebtorCodeAssigned,
  formatTransactionConfirmation,
} from "../../src/utils/formatter";
import { LABELS } from "../../src/config/labels";
import { FIXED_NOW, createTestDeps } from "../helpers";

const PROMPTED_AT = "2024-03-19T20:00:00.000Z";

const ACTIVE: Array<[Session, "main" | "debtors"]> = [
  [{ state: "awaiting_amount", isIncome: true }, "main"],
  [{ state: "awaiting_description", isIncome: true, amount: 100 }, "main"],
  [
    {
      state: "awaiting_confirmation",
      isIncome: false,
      amount: 100,
      description: "tea",
      promptedAt: PROMPTED_AT,
    },
    "main",
  ],
  [{ state: "awaiting_debtor_name" }, "debtors"],
  [{ state: "awaiting_debt_amount", debtorName: "Alice", debtorCode: "b47" }, "debtors"],
  [
    { state: "awaiting_debt_description", debtorName: "Alice", debtorCode: "b47", debtAmount: 10 },
    "debtors",
  ],
  [
    {
      state: "awaiting_debt_confirmation",
      debtorName: "Alice",
      debtorCode: "b47",
      debtAmount: 10,
      debtDescription: null,
      promptedAt: PROMPTED_AT,
    },
    "debtors",
  ],
  [{ state: "awaiting_debt_deletion_code" }, "debtors"],
];

describe("cancellation", () => {
  for (const [session, menu] of ACTIVE) {
    for (const token of ["/cancel", "لغو", LABELS.cancel, " Cancel "]) {
      it(`${session.state} + "${token}" returns to the ${menu} menu`, async () => {
        const step = await advanceConversation(createTestDeps(), 42, session, token);
        expect(step).toEqual({
          session: { state: "idle" },
          replies: [{ text: OPERATION_CANCELLED }, menuReply(menu)],
        });
      });
    }
  }
});

describe("unregistered slash commands", () => {
  for (const [session] of ACTIVE) {
    it(`${session.state} keeps its state on "/foo"`, async () => {
      const step = await advanceConversation(createTestDeps(), 42, session, " /foo bar");
      expect(step).toEqual({ session, replies: [{ text: UNKNOWN_COMMAND_IN_FLOW }] });
    });
  }
});

describe("income / expense flow", () => {
  it("starts with an amount prompt", () => {
    const step = startFlow("expense");
    expect(step.session).toEqual({ state: "awaiting_amount", isIncome: false });
    expect(step.replies[0].keyboard).toBe("cancel");
  });

  it("re-prompts on a bad amount without changing state", async () => {
    const session: Session = { state: "awaiting_amount", isIncome: true };
    for (const bad of ["abc", "0", "-5", "1e5", ""]) {
      const step = await advanceConversation(createTestDeps(), 42, session, bad);
      expect(step).toEqual({ session, replies: [{ text: INVALID_AMOUNT, keyboard: "cancel" }] });
    }
  });

  it("accepts large amounts", async () => {
    const step = await advanceConversation(
      createTestDeps(),
      42,
      { state: "awaiting_amount", isIncome: true },
      "150,000,000"
    );
    expect(step.session).toEqual({ state: "awaiting_description", isIncome: true, amount: 150000000 });
  });

  it("accepts amounts typed with Persian digits", async () => {
    const step = await advanceConversation(
      createTestDeps(),
      42,
      { state: "awaiting_amount", isIncome: false },
      "۵۰۰۰۰"
    );
    expect(step).toEqual({
      session: { state: "awaiting_description", isIncome: false, amount: 50000 },
      replies: [{ text: DESCRIPTION_PROMPT, keyboard: "cancel" }],
    });
  });

  it("accepts thousands separators", async () => {
    const step = await advanceConversation(
      createTestDeps(),
      42,
      { state: "awaiting_amount", isIncome: true },
      "50,000"
    );
    expect(step).toEqual({
      session: { state: "awaiting_description", isIncome: true, amount: 50000 },
      replies: [{ text: DESCRIPTION_PROMPT, keyboard: "cancel" }],
    });
  });

  it("snapshots the confirmation time", async () => {
    const step = await advanceConversation(
      createTestDeps(),
      42,
      { state: "awaiting_description", isIncome: false, amount: 20000 },
      "groceries"
    );
    expect(step).toEqual({
      session: {
        state: "awaiting_confirmation",
        isIncome: false,
        amount: 20000,
        description: "groceries",
        promptedAt: FIXED_NOW.toISOString(),
      },
      replies: [
        {
          text: formatTransactionConfirmation(false, 20000, "groceries", FIXED_NOW),
          keyboard: "confirm",
        },
      ],
    });
  });

  const confirming: Session = {
    state: "awaiting_confirmation",
    isIncome: true,
    amount: 50000,
    description: "salary",
    promptedAt: PROMPTED_AT,
  };

  it("stores the record with the prompt's timestamp", async () => {
    const deps = createTestDeps();
    const step = await advanceConversation(deps, 42, confirming, "yes");

    expect(step.session).toEqual({ state: "idle" });
    expect(step.replies[1]).toEqual(menuReply("main"));
    const [saved] = await deps.transactions.listByOwner(42);
    expect(saved.recordedAt.toISOString()).toBe(PROMPTED_AT);
    expect(step.replies[0].text).toContain("تاریخ شمسی: 1402/12/29");
  });

  it("anything but yes discards the draft", async () => {
    const deps = createTestDeps();
    const step = await advanceConversation(deps, 42, confirming, "خیر");

    expect(step.replies).toEqual([{ text: TRANSACTION_CANCELLED }, menuReply("main")]);
    expect(await deps.transactions.listByOwner(42)).toEqual([]);
  });

  it("reports a store failure and returns to idle", async () => {
    const deps = createTestDeps();
    const failing: TransactionRepository = {
      ...deps.transactions,
      create: vi.fn(async () => {
        throw new PersistenceError("insertTransaction failed");
      }),
    };
    const step = await advanceConversation(
      { ...deps, transactions: failing },
      42,
      confirming,
      LABELS.yes
    );

    expect(step).toEqual({
      session: { state: "idle" },
      replies: [{ text: TRANSACTION_SAVE_FAILED }, menuReply("main")],
    });
  });
});

describe("debt flow", () => {
  it("assigns a code as soon as the name arrives", async () => {
    const step = await advanceConversation(
      createTestDeps(),
      42,
      { state: "awaiting_debtor_name" },
      "Alice"
    );
    expect(step).toEqual({
      session: { state: "awaiting_debt_amount", debtorName: "Alice", debtorCode: "b47" },
      replies: [{ text: formatDebtorCodeAssigned("Alice", "b47"), keyboard: "cancel" }],
    });
  });

  it("offers skip for the description", async () => {
    const step = await advanceConversation(
      createTestDeps(),
      42,
      { state: "awaiting_debt_amount", debtorName: "Alice", debtorCode: "b47" },
      "10000"
    );
    expect(step.replies).toEqual([{ text: DEBT_DESCRIPTION_PROMPT, keyboard: "cancel_skip" }]);
  });

  it("skip stores no description", async () => {
    const step = await advanceConversation(
      createTestDeps(),
      42,
      { state: "awaiting_debt_description", debtorName: "Alice", debtorCode: "b47", debtAmount: 10 },
      LABELS.skip
    );
    expect(step.session).toMatchObject({
      state: "awaiting_debt_confirmation",
      debtDescription: null,
    });
  });

  const confirming: Session = {
    state: "awaiting_debt_confirmation",
    debtorName: "Alice",
    debtorCode: "b47",
    debtAmount: 10000,
    debtDescription: "lunch",
    promptedAt: PROMPTED_AT,
  };

  it("declining discards the debt", async () => {
    const deps = createTestDeps();
    const step = await advanceConversation(deps, 42, confirming, "no");

    expect(step.replies).toEqual([{ text: DEBT_CANCELLED }, menuReply("debtors")]);
    expect(await deps.debts.listByOwner(42)).toEqual([]);
  });

  it("confirming saves the debt", async () => {
    const deps = createTestDeps();
    const step = await advanceConversation(deps, 42, confirming, "بله");

    expect(step.replies[0].text).toContain("شناسه بدهکار: b47");
    expect(await deps.debts.listByOwner(42)).toEqual([
      {
        debtorCode: "b47",
        debtorName: "Alice",
        amount: 10000,
        description: "lunch",
        recordedAt: new Date(PROMPTED_AT),
        ownerId: 42,
      },
    ]);
  });

  it("reports a failed code lookup", async () => {
    const deps = createTestDeps();
    const step = await advanceConversation(
      {
        ...deps,
        debts: {
          ...deps.debts,
          listCodes: async () => {
            throw new PersistenceError("listDebtorCodes failed");
          },
        },
      },
      42,
      { state: "awaiting_debtor_name" },
      "Alice"
    );
    expect(step.replies).toEqual([{ text: DEBT_SAVE_FAILED }, menuReply("debtors")]);
  });

  it("reports a full code space as a save failure", async () => {
    const deps = createTestDeps();
    const full = new Set<string>();
    for (const letter of "abcdefghijklmnopqrstuvwxyz") {
      for (const d1 of "123456789") {
        for (const d2 of "123456789") full.add(letter + d1 + d2);
      }
    }
    const step = await advanceConversation(
      { ...deps, debts: { ...deps.debts, listCodes: async () => full } },
      42,
      { state: "awaiting_debtor_name" },
      "Alice"
    );
    expect(step).toEqual({
      session: { state: "idle" },
      replies: [{ text: DEBT_SAVE_FAILED }, menuReply("debtors")],
    });
  });
});

describe("debt deletion", () => {
  const session: Session = { state: "awaiting_debt_deletion_code" };

  it("reports an unknown code", async () => {
    const step = await advanceConversation(createTestDeps(), 42, session, "q11");
    expect(step.replies).toEqual([{ text: DEBT_NOT_FOUND }, menuReply("debtors")]);
  });

  it("reports a store failure", async () => {
    const deps = createTestDeps();
    const step = await advanceConversation(
      {
        ...deps,
        debts: {
          ...deps.debts,
          deleteById: async () => {
            throw new PersistenceError("deleteDebt failed");
          },
        },
      },
      42,
      session,
      "b47"
    );
    expect(step.replies).toEqual([{ text: DEBT_DELETE_FAILED }, menuReply("debtors")]);
  });
});
