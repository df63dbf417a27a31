import { Bot, GrammyError, HttpError } from "grammy";
import type { Env } from "./config/env";
import type { BotDeps } from "./types/deps";
import { rateLimit } from "./middleware/rateLimit";
import { handleStart } from "./handlers/start";
import { handleCommand } from "./handlers/commands";
import { handleMessage } from "./handlers/message";

export function createBot(env: Env, deps: BotDeps): Bot {
  const bot = new Bot(env.BOT_TOKEN);

  bot.use(
    rateLimit(deps.kv, {
      maxMessages: env.RATE_LIMIT_MAX_MESSAGES,
      windowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
    })
  );

  // === COMMANDS ===
  bot.command("start", (ctx) => handleStart(ctx, deps));
  bot.command("cancel", (ctx) => handleCommand(ctx, deps, "cancel"));
  bot.command("edit_tr", (ctx) => handleCommand(ctx, deps, "edit_tr"));
  bot.command("del_tr", (ctx) => handleCommand(ctx, deps, "del_tr"));
  bot.command("del_all_tr", (ctx) => handleCommand(ctx, deps, "del_all_tr"));
  bot.command("debt_list", (ctx) => handleCommand(ctx, deps, "debt_list"));

  // === MENU BUTTONS & FLOW INPUT ===
  bot.on("message:text", (ctx) => handleMessage(ctx, deps));

  // Error handler
  bot.catch(async (err) => {
    const cause = err.error;
    if (cause instanceof GrammyError) {
      console.error(`[Bot] Telegram API error in update ${err.ctx.update.update_id}:`, cause.description);
    } else if (cause instanceof HttpError) {
      console.error(`[Bot] Network error in update ${err.ctx.update.update_id}:`, cause);
    } else {
      console.error(`[Bot] Unhandled error in update ${err.ctx.update.update_id}:`, cause);
    }

    if (env.ADMIN_ID !== undefined) {
      try {
        await bot.api.sendMessage(
          env.ADMIN_ID,
          `⚠️ Bot error in update ${err.ctx.update.update_id}: ${err.message}`
        );
      } catch (notifyError) {
        console.error("[Bot] Failed to notify admin:", notifyError);
      }
    }
  });

  return bot;
}
