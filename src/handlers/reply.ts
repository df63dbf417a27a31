import type { Context } from "grammy";
import type { BotReply } from "../types/conversation";
import { buildKeyboard } from "./keyboard";

/**
 * Send dispatcher replies in order. A reply without a keyboard leaves the
 * user's current keyboard in place.
 */
export async function sendReplies(ctx: Pick<Context, "reply">, replies: BotReply[]): Promise<void> {
  for (const r of replies) {
    if (r.keyboard) {
      await ctx.reply(r.text, { reply_markup: buildKeyboard(r.keyboard) });
    } else {
      await ctx.reply(r.text);
    }
  }
}
