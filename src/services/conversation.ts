/**
 * Conversation State Machine
 *
 * Drives the multi-step entry flows:
 *   income/expense: amount → description → confirmation
 *   debt:           debtor name (code generated) → amount → description? → confirmation
 *   debt deletion:  debtor code
 *
 * Every step is a pure (session, text) → (session, replies) transition apart
 * from the repository calls at the end of a flow. Persisting the session is
 * the caller's job.
 */

import { isAffirmative, isCancelToken, isSkipToken } from "../config/labels";
import { PersistenceError } from "../db/errors";
import { IDLE } from "../types/conversation";
import type { BotReply, ConversationStep, MenuKind, Session } from "../types/conversation";
import type { BotDeps } from "../types/deps";
import {
  amountPrompt,
  DEBT_CANCELLED,
  DEBT_CODE_PROMPT,
  DEBT_DELETE_FAILED,
  DEBT_DESCRIPTION_PROMPT,
  DEBT_NOT_FOUND,
  DEBT_SAVE_FAILED,
  DEBTOR_NAME_PROMPT,
  DESCRIPTION_PROMPT,
  formatDebtConfirmation,
  formatDebtDeleted,
  formatDebtorCodeAssigned,
  formatDebtReceipt,
  formatTransactionConfirmation,
  formatTransactionReceipt,
  INVALID_AMOUNT,
  menuPrompt,
  OPERATION_CANCELLED,
  TRANSACTION_CANCELLED,
  TRANSACTION_SAVE_FAILED,
  UNKNOWN_COMMAND_IN_FLOW,
} from "../utils/formatter";
import { parseAmount } from "../utils/validator";
import { deleteDebtByCode, recordDebt } from "./debt";
import { DebtorCodeSpaceExhaustedError, nextDebtorCode } from "./debtorId";
import { recordTransaction } from "./transaction";

export type FlowKind = "income" | "expense" | "add_debt" | "delete_debt";

/** Failures that end a debt flow with DEBT_SAVE_FAILED */
function isDebtSaveFailure(error: unknown): boolean {
  return error instanceof PersistenceError || error instanceof DebtorCodeSpaceExhaustedError;
}

export function menuReply(menu: MenuKind): BotReply {
  return { text: menuPrompt(menu), keyboard: menu };
}

/** Back to idle with a final message and the given menu */
function finish(menu: MenuKind, text: string): ConversationStep {
  return { session: IDLE, replies: [{ text }, menuReply(menu)] };
}

/**
 * Menu a session returns to when its flow ends.
 */
export function owningMenu(session: Session): MenuKind {
  switch (session.state) {
    case "awaiting_debtor_name":
    case "awaiting_debt_amount":
    case "awaiting_debt_description":
    case "awaiting_debt_confirmation":
    case "awaiting_debt_deletion_code":
      return "debtors";
    default:
      return "main";
  }
}

/**
 * Entry point of a flow. Any previous session is simply replaced.
 */
export function startFlow(flow: FlowKind): ConversationStep {
  switch (flow) {
    case "income":
    case "expense": {
      const isIncome = flow === "income";
      return {
        session: { state: "awaiting_amount", isIncome },
        replies: [{ text: amountPrompt(isIncome), keyboard: "cancel" }],
      };
    }
    case "add_debt":
      return {
        session: { state: "awaiting_debtor_name" },
        replies: [{ text: DEBTOR_NAME_PROMPT, keyboard: "cancel" }],
      };
    case "delete_debt":
      return {
        session: { state: "awaiting_debt_deletion_code" },
        replies: [{ text: DEBT_CODE_PROMPT, keyboard: "cancel" }],
      };
  }
}

/**
 * Abort the active flow, discarding its scratch values.
 */
export function cancelConversation(session: Session): ConversationStep {
  return finish(owningMenu(session), OPERATION_CANCELLED);
}

/**
 * Feed one message to the active flow.
 */
export async function advanceConversation(
  deps: BotDeps,
  userId: number,
  session: Session,
  text: string
): Promise<ConversationStep> {
  if (session.state === "idle") {
    return { session: IDLE, replies: [] };
  }
  if (isCancelToken(text)) {
    return cancelConversation(session);
  }
  // Registered commands never get here; anything else with a slash is not input
  if (text.trimStart().startsWith("/")) {
    return { session, replies: [{ text: UNKNOWN_COMMAND_IN_FLOW }] };
  }

  switch (session.state) {
    // ── Income / expense ──
    case "awaiting_amount": {
      const amount = parseAmount(text);
      if (amount === null) {
        return { session, replies: [{ text: INVALID_AMOUNT, keyboard: "cancel" }] };
      }
      return {
        session: { state: "awaiting_description", isIncome: session.isIncome, amount },
        replies: [{ text: DESCRIPTION_PROMPT, keyboard: "cancel" }],
      };
    }

    case "awaiting_description": {
      // The prompt's date is the record's date: both messages show the same day
      const promptedAt = deps.now();
      return {
        session: {
          state: "awaiting_confirmation",
          isIncome: session.isIncome,
          amount: session.amount,
          description: text,
          promptedAt: promptedAt.toISOString(),
        },
        replies: [
          {
            text: formatTransactionConfirmation(session.isIncome, session.amount, text, promptedAt),
            keyboard: "confirm",
          },
        ],
      };
    }

    case "awaiting_confirmation": {
      if (!isAffirmative(text)) {
        return finish("main", TRANSACTION_CANCELLED);
      }
      try {
        const saved = await recordTransaction(deps.transactions, {
          amount: session.amount,
          description: session.description,
          isIncome: session.isIncome,
          recordedAt: new Date(session.promptedAt),
          ownerId: userId,
        });
        return finish("main", formatTransactionReceipt(saved));
      } catch (error) {
        if (error instanceof PersistenceError) return finish("main", TRANSACTION_SAVE_FAILED);
        throw error;
      }
    }

    // ── Debts ──
    case "awaiting_debtor_name": {
      let debtorCode: string;
      try {
        debtorCode = await nextDebtorCode(deps.debts, deps.random);
      } catch (error) {
        if (isDebtSaveFailure(error)) return finish("debtors", DEBT_SAVE_FAILED);
        throw error;
      }
      return {
        session: { state: "awaiting_debt_amount", debtorName: text, debtorCode },
        replies: [{ text: formatDebtorCodeAssigned(text, debtorCode), keyboard: "cancel" }],
      };
    }

    case "awaiting_debt_amount": {
      const debtAmount = parseAmount(text);
      if (debtAmount === null) {
        return { session, replies: [{ text: INVALID_AMOUNT, keyboard: "cancel" }] };
      }
      return {
        session: {
          state: "awaiting_debt_description",
          debtorName: session.debtorName,
          debtorCode: session.debtorCode,
          debtAmount,
        },
        replies: [{ text: DEBT_DESCRIPTION_PROMPT, keyboard: "cancel_skip" }],
      };
    }

    case "awaiting_debt_description": {
      const debtDescription = isSkipToken(text) ? null : text;
      const promptedAt = deps.now();
      return {
        session: {
          state: "awaiting_debt_confirmation",
          debtorName: session.debtorName,
          debtorCode: session.debtorCode,
          debtAmount: session.debtAmount,
          debtDescription,
          promptedAt: promptedAt.toISOString(),
        },
        replies: [
          {
            text: formatDebtConfirmation(
              session.debtorName,
              session.debtorCode,
              session.debtAmount,
              debtDescription,
              promptedAt
            ),
            keyboard: "confirm",
          },
        ],
      };
    }

    case "awaiting_debt_confirmation": {
      if (!isAffirmative(text)) {
        return finish("debtors", DEBT_CANCELLED);
      }
      try {
        const saved = await recordDebt(
          deps.debts,
          {
            debtorCode: session.debtorCode,
            debtorName: session.debtorName,
            amount: session.debtAmount,
            description: session.debtDescription,
            recordedAt: new Date(session.promptedAt),
            ownerId: userId,
          },
          deps.random
        );
        return finish("debtors", formatDebtReceipt(saved));
      } catch (error) {
        if (isDebtSaveFailure(error)) return finish("debtors", DEBT_SAVE_FAILED);
        throw error;
      }
    }

    case "awaiting_debt_deletion_code": {
      try {
        const deleted = await deleteDebtByCode(deps.debts, userId, text);
        return finish("debtors", deleted ? formatDebtDeleted(deleted) : DEBT_NOT_FOUND);
      } catch (error) {
        if (error instanceof PersistenceError) return finish("debtors", DEBT_DELETE_FAILED);
        throw error;
      }
    }
  }
}
