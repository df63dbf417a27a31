import type { Context } from "grammy";
import type { BotDeps } from "../types/deps";
import { dispatchCommand } from "../services/router";
import { replyWithFailure } from "./message";
import { sendReplies } from "./reply";

/**
 * /start: drop any half-finished flow and show the welcome text.
 */
export async function handleStart(ctx: Context, deps: BotDeps): Promise<void> {
  if (!ctx.from) return;

  try {
    console.log(`[Cmd] /start from user ${ctx.from.id}`);
    const replies = await dispatchCommand(deps, ctx.from.id, "start");
    await sendReplies(ctx, replies);
  } catch (error) {
    console.error("[Cmd] /start error:", error);
    await replyWithFailure(ctx);
  }
}
