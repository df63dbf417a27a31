/**
 * Per-user Rate Limiter (KV-backed)
 *
 * Limits updates per user within a fixed window. Counters live in the same
 * SQLite KV as sessions, so they survive a restart.
 *
 * KV key format: rl:{userId}
 * KV value: JSON { count: number, start: number (epoch seconds) }
 * KV TTL: whatever remains of the current window
 */

import type { Context, NextFunction } from "grammy";
import { z } from "zod";
import type { KeyValueStore } from "../db/kv";
import { RATE_LIMITED } from "../utils/formatter";

export interface RateLimitOptions {
  maxMessages: number;
  windowSeconds: number;
}

const entrySchema = z.object({
  count: z.number().int().nonnegative(),
  start: z.number(),
});

export interface RateLimitVerdict {
  limited: boolean;
  /** True only for the first blocked message of a window */
  notify: boolean;
}

const ALLOWED: RateLimitVerdict = { limited: false, notify: false };

/**
 * Count one message for the user and decide whether to block it.
 */
export async function checkRateLimit(
  kv: KeyValueStore,
  userId: number,
  options: RateLimitOptions,
  nowMs: number = Date.now()
): Promise<RateLimitVerdict> {
  const key = `rl:${userId}`;
  const now = Math.floor(nowMs / 1000);

  try {
    const raw = await kv.get(key);
    const parsed = raw === null ? null : entrySchema.safeParse(JSON.parse(raw));
    const data = parsed?.success ? parsed.data : null;

    // No entry or window expired → start fresh
    if (!data || now - data.start >= options.windowSeconds) {
      await kv.put(key, JSON.stringify({ count: 1, start: now }), {
        expirationTtl: options.windowSeconds,
      });
      return ALLOWED;
    }

    if (data.count > options.maxMessages) {
      return { limited: true, notify: false };
    }

    await kv.put(key, JSON.stringify({ count: data.count + 1, start: data.start }), {
      expirationTtl: data.start + options.windowSeconds - now,
    });

    if (data.count === options.maxMessages) {
      console.warn(
        `[RateLimit] User ${userId} exceeded ${options.maxMessages} msgs/${options.windowSeconds}s`
      );
      return { limited: true, notify: true };
    }
    return ALLOWED;
  } catch (error) {
    // Fail-open: a broken counter must not lock everyone out
    console.error("[RateLimit] KV error, failing open:", error);
    return ALLOWED;
  }
}

/**
 * grammY middleware: drops updates from users over the limit. Only the
 * first dropped update of a window gets a reply.
 */
export function rateLimit(kv: KeyValueStore, options: RateLimitOptions) {
  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const userId = ctx.from?.id;
    if (userId === undefined) {
      await next();
      return;
    }
    const verdict = await checkRateLimit(kv, userId, options);
    if (verdict.limited) {
      if (verdict.notify) await ctx.reply(RATE_LIMITED);
      return;
    }
    await next();
  };
}
