/**
 * Conversation Session State (KV-backed)
 *
 * One session per user, holding the current flow state and its scratch
 * values. Stored with a TTL so an abandoned flow expires on its own.
 *
 * KV key format: conv:{userId}
 * Idle sessions are not stored: a missing key means idle.
 */

import type { KeyValueStore } from "../db/kv";
import { PersistenceError } from "../db/errors";
import { IDLE, sessionSchema } from "../types/conversation";
import type { Session } from "../types/conversation";

function sessionKey(userId: number): string {
  return `conv:${userId}`;
}

/**
 * Current session for a user. Missing, expired or unreadable sessions are
 * treated as idle (fail-open: the user just starts over).
 */
export async function getSession(kv: KeyValueStore, userId: number): Promise<Session> {
  let raw: string | null;
  try {
    raw = await kv.get(sessionKey(userId));
  } catch (error) {
    console.error("[Session] KV read error:", error);
    return IDLE;
  }
  if (raw === null) return IDLE;

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    console.warn(`[Session] Dropping malformed session for user ${userId}:`, error);
    return IDLE;
  }

  const parsed = sessionSchema.safeParse(decoded);
  if (!parsed.success) {
    console.warn(`[Session] Dropping invalid session for user ${userId}:`, parsed.error.message);
    return IDLE;
  }
  return parsed.data;
}

/**
 * Persist a session. Saving an idle session clears the key.
 * Write failures surface as PersistenceError.
 */
export async function saveSession(
  kv: KeyValueStore,
  userId: number,
  session: Session,
  ttlSeconds: number
): Promise<void> {
  if (session.state === "idle") {
    await clearSession(kv, userId);
    return;
  }
  try {
    await kv.put(sessionKey(userId), JSON.stringify(session), { expirationTtl: ttlSeconds });
  } catch (error) {
    console.error("[Session] KV write error:", error);
    throw new PersistenceError("Failed to save session", { cause: error });
  }
}

/**
 * Drop a user's session (completion, cancellation, interruption).
 *
 * If the delete fails, an explicit idle session is written over the key
 * instead, so a finished flow cannot be resumed. Only when both writes fail
 * does this throw PersistenceError.
 */
export async function clearSession(kv: KeyValueStore, userId: number): Promise<void> {
  try {
    await kv.delete(sessionKey(userId));
    return;
  } catch (error) {
    console.error("[Session] KV delete error, overwriting with idle:", error);
  }
  try {
    await kv.put(sessionKey(userId), JSON.stringify(IDLE));
  } catch (error) {
    console.error("[Session] KV overwrite error:", error);
    throw new PersistenceError("Failed to clear session", { cause: error });
  }
}
