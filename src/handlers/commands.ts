/**
 * Slash Command Handlers
 *
 * /cancel, /edit_tr <id>, /del_tr <id>, /del_all_tr, /debt_list.
 * Arguments arrive in ctx.match; validation happens in the dispatcher.
 */

import type { CommandContext, Context } from "grammy";
import type { BotDeps } from "../types/deps";
import { dispatchCommand } from "../services/router";
import type { SlashCommand } from "../services/router";
import { replyWithFailure } from "./message";
import { sendReplies } from "./reply";

export async function handleCommand(
  ctx: CommandContext<Context>,
  deps: BotDeps,
  command: SlashCommand
): Promise<void> {
  const userId = ctx.from?.id;
  if (userId === undefined) return;

  try {
    console.log(`[Cmd] /${command} from user ${userId}`);
    const replies = await dispatchCommand(deps, userId, command, ctx.match);
    await sendReplies(ctx, replies);
  } catch (error) {
    console.error(`[Cmd] /${command} error:`, error);
    await replyWithFailure(ctx);
  }
}
