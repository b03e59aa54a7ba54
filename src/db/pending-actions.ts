import { getDb } from "./connection";
import type { PendingAction, PendingActionType, PendingState } from "../types";

interface PendingRow {
  user_id: string;
  action_type: PendingActionType;
  state: string;
  expires_at: string;
  created_at: string;
}

function rowToPending(row: PendingRow): PendingAction | null {
  let state: unknown;
  try {
    state = JSON.parse(row.state);
  } catch {
    return null;
  }
  if (!isPendingState(state) || state.type !== row.action_type) return null;
  return {
    userId: row.user_id,
    state,
    expiresAt: new Date(row.expires_at),
    createdAt: new Date(row.created_at),
  };
}

const PENDING_TYPES: PendingActionType[] = [
  "confirm_transaction",
  "confirm_clear",
  "confirm_clear_recurring",
  "confirm_cancel_recurring",
  "awaiting_recurring_field",
  "recurring_setup",
];

function isPendingState(value: unknown): value is PendingState {
  if (value === null || typeof value !== "object" || !("type" in value)) return false;
  const type = value.type;
  if (!PENDING_TYPES.some((t) => t === type)) return false;
  if (type === "confirm_transaction") return "drafts" in value && Array.isArray(value.drafts);
  if (type === "recurring_setup") {
    return "ruleId" in value && typeof value.ruleId === "number" && "queue" in value && Array.isArray(value.queue);
  }
  if (type === "confirm_cancel_recurring" || type === "awaiting_recurring_field") {
    return "ruleId" in value && typeof value.ruleId === "number";
  }
  return true;
}

/**
 * Store the user's pending action, replacing any previous one (last pending wins).
 */
export function savePending(userId: string, state: PendingState, ttlMinutes: number, now: Date = new Date()): PendingAction {
  const expiresAt = new Date(now.getTime() + ttlMinutes * 60_000);
  getDb()
    .prepare(
      `INSERT INTO pending_actions (user_id, action_type, state, expires_at, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(user_id) DO UPDATE SET
         action_type = excluded.action_type,
         state = excluded.state,
         expires_at = excluded.expires_at,
         created_at = excluded.created_at`,
    )
    .run(userId, state.type, JSON.stringify(state), expiresAt.toISOString(), now.toISOString());
  return { userId, state, expiresAt, createdAt: now };
}

/**
 * The user's live pending action. An expired or unreadable one is deleted and reported as absent.
 */
export function getPending(userId: string, now: Date = new Date()): PendingAction | null {
  const row = getDb()
    .prepare<[string], PendingRow>("SELECT * FROM pending_actions WHERE user_id = ?")
    .get(userId);
  if (!row) return null;

  const pending = rowToPending(row);
  if (!pending || pending.expiresAt.getTime() <= now.getTime()) {
    clearPending(userId);
    return null;
  }
  return pending;
}

export function clearPending(userId: string): boolean {
  const result = getDb().prepare("DELETE FROM pending_actions WHERE user_id = ?").run(userId);
  return result.changes > 0;
}

/** Delete every expired pending action. Returns how many were removed. */
export function purgeExpiredPending(now: Date = new Date()): number {
  const result = getDb().prepare("DELETE FROM pending_actions WHERE expires_at <= ?").run(now.toISOString());
  return result.changes;
}
