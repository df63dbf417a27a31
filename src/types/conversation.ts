import { z } from "zod";

/**
 * Per-user conversation session. Each state carries exactly the scratch
 * values collected so far, so a confirmation step can never run with a
 * missing amount or description.
 */
export const sessionSchema = z.discriminatedUnion("state", [
  z.object({ state: z.literal("idle") }),

  // ── Income / expense flow ──
  z.object({ state: z.literal("awaiting_amount"), isIncome: z.boolean() }),
  z.object({
    state: z.literal("awaiting_description"),
    isIncome: z.boolean(),
    amount: z.number().positive(),
  }),
  z.object({
    state: z.literal("awaiting_confirmation"),
    isIncome: z.boolean(),
    amount: z.number().positive(),
    description: z.string(),
    /** When the confirmation was shown; becomes the record's timestamp */
    promptedAt: z.string().datetime(),
  }),

  // ── Debt flow ──
  z.object({ state: z.literal("awaiting_debtor_name") }),
  z.object({
    state: z.literal("awaiting_debt_amount"),
    debtorName: z.string(),
    debtorCode: z.string(),
  }),
  z.object({
    state: z.literal("awaiting_debt_description"),
    debtorName: z.string(),
    debtorCode: z.string(),
    debtAmount: z.number().positive(),
  }),
  z.object({
    state: z.literal("awaiting_debt_confirmation"),
    debtorName: z.string(),
    debtorCode: z.string(),
    debtAmount: z.number().positive(),
    debtDescription: z.string().nullable(),
    promptedAt: z.string().datetime(),
  }),
  z.object({ state: z.literal("awaiting_debt_deletion_code") }),
]);

export type Session = z.infer<typeof sessionSchema>;

export const IDLE: Session = { state: "idle" };

/** Reply keyboards the bot can attach to a message */
export type KeyboardKind =
  | "main"
  | "edit"
  | "debtors"
  | "cancel"
  | "cancel_skip"
  | "confirm"
  | "edit_fields";

/** Menu a flow returns to when it finishes or is cancelled */
export type MenuKind = Extract<KeyboardKind, "main" | "edit" | "debtors">;

export interface BotReply {
  text: string;
  keyboard?: KeyboardKind;
}

export interface ConversationStep {
  session: Session;
  replies: BotReply[];
}
