import { matchLabel } from "../config/labels";
import { PersistenceError } from "../db/errors";
import type { BotReply, ConversationStep, MenuKind } from "../types/conversation";
import type { BotDeps } from "../types/deps";
import {
  DELETE_USAGE,
  EDIT_USAGE,
  formatDebtList,
  formatDeletedCount,
  formatEditPrompt,
  formatSummary,
  formatTransactionDeleted,
  GENERIC_FAILURE,
  INVALID_TRANSACTION_ID,
  missingIdMessage,
  NO_DEBTS,
  NO_TRANSACTIONS,
  NOTHING_TO_DELETE,
  TRANSACTION_NOT_FOUND,
  WELCOME_MESSAGE,
} from "../utils/formatter";
import { parseRecordId } from "../utils/validator";
import {
  advanceConversation,
  cancelConversation,
  menuReply,
  owningMenu,
  startFlow,
} from "./conversation";
import type { FlowKind } from "./conversation";
import { getDebtList } from "./debt";
import { clearSession, getSession, saveSession } from "./session";
import { deleteAllTransactions, deleteTransaction, getSummary } from "./transaction";

export type SlashCommand = "start" | "cancel" | "edit_tr" | "del_tr" | "del_all_tr" | "debt_list";

/**
 * Run a one-shot ledger action. Store faults become a generic failure
 * message followed by the menu the action belongs to.
 */
async function guarded(menu: MenuKind, action: () => Promise<BotReply[]>): Promise<BotReply[]> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof PersistenceError) {
      return [{ text: GENERIC_FAILURE }, menuReply(menu)];
    }
    throw error;
  }
}

/**
 * Persist the session a conversation step produced and hand back its replies.
 *
 * A step that ends its flow may already have committed a record, so its
 * replies stand even if the session could not be cleared. A step that
 * continues its flow is abandoned instead: the session is reset where
 * possible and the user lands on the menu.
 */
async function applyStep(
  deps: BotDeps,
  userId: number,
  step: ConversationStep,
  menu: MenuKind
): Promise<BotReply[]> {
  try {
    await saveSession(deps.kv, userId, step.session, deps.sessionTtlSeconds);
    return step.replies;
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    if (step.session.state === "idle") {
      console.error(`[Session] Flow for user ${userId} finished but its session is still stored`);
      return step.replies;
    }
  }

  try {
    await clearSession(deps.kv, userId);
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    console.warn(`[Session] Could not reset session for user ${userId}`);
  }
  return [{ text: GENERIC_FAILURE }, menuReply(menu)];
}

function enterFlow(deps: BotDeps, userId: number, flow: FlowKind): Promise<BotReply[]> {
  const step = startFlow(flow);
  return applyStep(deps, userId, step, owningMenu(step.session));
}

// ── One-shot actions ──

function showSummary(deps: BotDeps, userId: number): Promise<BotReply[]> {
  return guarded("main", async () => {
    const summary = await getSummary(deps.transactions, userId);
    const text = summary.count === 0 ? NO_TRANSACTIONS : formatSummary(summary);
    return [{ text }, menuReply("main")];
  });
}

function showDebtList(deps: BotDeps, userId: number): Promise<BotReply[]> {
  return guarded("debtors", async () => {
    const listing = await getDebtList(deps.debts, userId);
    const text = listing.debts.length === 0 ? NO_DEBTS : formatDebtList(listing);
    return [{ text }, menuReply("debtors")];
  });
}

function deleteAll(deps: BotDeps, userId: number): Promise<BotReply[]> {
  return guarded("edit", async () => {
    const count = await deleteAllTransactions(deps.transactions, userId);
    const text = count === 0 ? NOTHING_TO_DELETE : formatDeletedCount(count);
    return [{ text }, menuReply("edit")];
  });
}

type IdArgument = { ok: true; id: number } | { ok: false; replies: BotReply[] };

/**
 * First whitespace-delimited argument as a transaction id. Errors abort
 * to the edit menu.
 */
function parseIdArgument(command: SlashCommand, args: string): IdArgument {
  const [first = ""] = args.trim().split(/\s+/);
  if (first === "") {
    return { ok: false, replies: [{ text: missingIdMessage(command) }, menuReply("edit")] };
  }
  const id = parseRecordId(first);
  if (id === null) {
    return { ok: false, replies: [{ text: INVALID_TRANSACTION_ID }, menuReply("edit")] };
  }
  return { ok: true, id };
}

function showEditTarget(deps: BotDeps, userId: number, args: string): Promise<BotReply[]> {
  const parsed = parseIdArgument("edit_tr", args);
  if (!parsed.ok) return Promise.resolve(parsed.replies);

  return guarded("edit", async () => {
    const target = await deps.transactions.findById(userId, parsed.id);
    if (!target) {
      return [{ text: TRANSACTION_NOT_FOUND }, menuReply("edit")];
    }
    // Field selection ends here: there is no edit flow behind these buttons
    return [{ text: formatEditPrompt(target), keyboard: "edit_fields" }];
  });
}

function deleteById(deps: BotDeps, userId: number, args: string): Promise<BotReply[]> {
  const parsed = parseIdArgument("del_tr", args);
  if (!parsed.ok) return Promise.resolve(parsed.replies);

  return guarded("edit", async () => {
    const deleted = await deleteTransaction(deps.transactions, userId, parsed.id);
    const text = deleted ? formatTransactionDeleted(deleted) : TRANSACTION_NOT_FOUND;
    return [{ text }, menuReply("edit")];
  });
}

/**
 * Route a plain text message: to the active flow if there is one, otherwise
 * to whatever menu button it names.
 */
export async function dispatchText(
  deps: BotDeps,
  userId: number,
  text: string
): Promise<BotReply[]> {
  const session = await getSession(deps.kv, userId);
  if (session.state !== "idle") {
    const step = await advanceConversation(deps, userId, session, text);
    return applyStep(deps, userId, step, owningMenu(session));
  }

  switch (matchLabel(text)) {
    case "income":
      return enterFlow(deps, userId, "income");
    case "expense":
      return enterFlow(deps, userId, "expense");
    case "addDebt":
      return enterFlow(deps, userId, "add_debt");
    case "deleteDebt":
      return enterFlow(deps, userId, "delete_debt");

    case "summary":
      return showSummary(deps, userId);
    case "listDebts":
      return showDebtList(deps, userId);
    case "deleteAll":
      return deleteAll(deps, userId);

    case "editMenu":
      return [menuReply("edit")];
    case "debtorsMenu":
      return [menuReply("debtors")];
    case "editTransaction":
      return [{ text: EDIT_USAGE }, menuReply("edit")];
    case "deleteTransaction":
      return [{ text: DELETE_USAGE }, menuReply("edit")];

    default:
      return [menuReply("main")];
  }
}

/**
 * Route a slash command. Anything but /cancel interrupts an active flow
 * and discards its scratch values.
 */
export async function dispatchCommand(
  deps: BotDeps,
  userId: number,
  command: SlashCommand,
  args = ""
): Promise<BotReply[]> {
  if (command === "cancel") {
    const session = await getSession(deps.kv, userId);
    if (session.state === "idle") return [menuReply("main")];
    return applyStep(deps, userId, cancelConversation(session), owningMenu(session));
  }

  try {
    await clearSession(deps.kv, userId);
  } catch (error) {
    if (error instanceof PersistenceError) return [{ text: GENERIC_FAILURE }, menuReply("main")];
    throw error;
  }

  switch (command) {
    case "start":
      return [{ text: WELCOME_MESSAGE, keyboard: "main" }];
    case "edit_tr":
      return showEditTarget(deps, userId, args);
    case "del_tr":
      return deleteById(deps, userId, args);
    case "del_all_tr":
      return deleteAll(deps, userId);
    case "debt_list":
      return showDebtList(deps, userId);
  }
}
