import type { Context } from "grammy";
import type { BotDeps } from "../types/deps";
import { dispatchText } from "../services/router";
import { GENERIC_FAILURE } from "../utils/formatter";
import { buildKeyboard } from "./keyboard";
import { sendReplies } from "./reply";

/**
 * Last-resort reply after an unexpected error: generic message plus the
 * main menu, so the user is never left without buttons.
 */
export async function replyWithFailure(ctx: Pick<Context, "reply">): Promise<void> {
  try {
    await ctx.reply(GENERIC_FAILURE, { reply_markup: buildKeyboard("main") });
  } catch (error) {
    console.error("[Bot] Failed to send error reply:", error);
  }
}

/**
 * Every plain text message: menu buttons and flow input alike.
 */
export async function handleMessage(ctx: Context, deps: BotDeps): Promise<void> {
  const text = ctx.message?.text;
  if (!text || !ctx.from) return;

  try {
    const replies = await dispatchText(deps, ctx.from.id, text);
    await sendReplies(ctx, replies);
  } catch (error) {
    console.error("[Bot] Handler error:", error);
    await replyWithFailure(ctx);
  }
}
