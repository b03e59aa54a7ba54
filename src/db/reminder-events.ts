import { getDb } from "./connection";
import type { BillStatus, ReminderEvent, ReminderStatus } from "../types";

interface ReminderRow {
  id: number;
  bill_instance_id: number;
  offset_days: number;
  scheduled_for: string;
  status: ReminderStatus;
  attempts: number;
  last_error: string | null;
  claimed_at: string | null;
  sent_at: string | null;
  created_at: string;
}

function rowToReminder(row: ReminderRow): ReminderEvent {
  return {
    id: row.id,
    billInstanceId: row.bill_instance_id,
    offsetDays: row.offset_days,
    scheduledFor: new Date(row.scheduled_for),
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error ?? undefined,
    claimedAt: row.claimed_at ? new Date(row.claimed_at) : undefined,
    sentAt: row.sent_at ? new Date(row.sent_at) : undefined,
    createdAt: new Date(row.created_at),
  };
}

/** Schedule a reminder. Returns false when the same offset already exists for the instance. */
export function insertReminder(
  billInstanceId: number,
  offsetDays: number,
  scheduledFor: Date,
  now: Date = new Date(),
): boolean {
  const result = getDb()
    .prepare(
      `INSERT OR IGNORE INTO reminder_events (bill_instance_id, offset_days, scheduled_for, created_at)
       VALUES (?, ?, ?, ?)`,
    )
    .run(billInstanceId, offsetDays, scheduledFor.toISOString(), now.toISOString());
  return result.changes > 0;
}

export function getReminder(id: number): ReminderEvent | null {
  const row = getDb().prepare<[number], ReminderRow>("SELECT * FROM reminder_events WHERE id = ?").get(id);
  return row ? rowToReminder(row) : null;
}

export function listReminders(billInstanceId: number): ReminderEvent[] {
  return getDb()
    .prepare<[number], ReminderRow>(
      "SELECT * FROM reminder_events WHERE bill_instance_id = ? ORDER BY scheduled_for, id",
    )
    .all(billInstanceId)
    .map(rowToReminder);
}

/** A due reminder with what it takes to write the message */
export interface DueReminder {
  reminder: ReminderEvent;
  userId: string;
  ruleId: number;
  serviceName: string;
  currency: string;
  /** The rule's IANA zone, for the local date of the send */
  timezone: string;
  instanceId: number;
  instanceStatus: BillStatus;
  dueDate: string;
  amount: number;
  paymentLink?: string;
  reference?: string;
}

interface DueRow extends ReminderRow {
  user_id: string;
  rule_id: number;
  service_name: string;
  currency: string;
  timezone: string;
  instance_status: BillStatus;
  due_date: string;
  amount: number;
  payment_link: string | null;
  reference: string | null;
}

/** How long a claim holds before another dispatcher may take the reminder over */
export const CLAIM_LEASE_MS = 10 * 60 * 1000;

function leaseCutoff(now: Date): string {
  return new Date(now.getTime() - CLAIM_LEASE_MS).toISOString();
}

/**
 * Pending reminders scheduled at or before `now` whose bill is still open
 * and whose rule is active, oldest first. Reminders under a live claim are left out.
 */
export function listDueReminders(now: Date, limit = 500): DueReminder[] {
  const rows = getDb()
    .prepare<[string, string, number], DueRow>(
      `SELECT e.*, r.user_id, r.id AS rule_id, r.service_name, r.currency, r.timezone,
              b.status AS instance_status, b.due_date,
              COALESCE(b.amount, r.amount) AS amount,
              COALESCE(b.payment_link, r.payment_link) AS payment_link,
              COALESCE(b.reference, r.payment_reference) AS reference
       FROM reminder_events e
       JOIN bill_instances b ON b.id = e.bill_instance_id
       JOIN recurring_rules r ON r.id = b.rule_id
       WHERE e.status = 'pending'
         AND e.scheduled_for <= ?
         AND (e.claimed_at IS NULL OR e.claimed_at <= ?)
         AND b.status IN ('pending', 'reminded')
         AND r.status = 'active'
       ORDER BY e.scheduled_for, e.id
       LIMIT ?`,
    )
    .all(now.toISOString(), leaseCutoff(now), limit);

  return rows.map((row) => ({
    reminder: rowToReminder(row),
    userId: row.user_id,
    ruleId: row.rule_id,
    serviceName: row.service_name,
    currency: row.currency,
    timezone: row.timezone,
    instanceId: row.bill_instance_id,
    instanceStatus: row.instance_status,
    dueDate: row.due_date,
    amount: row.amount,
    paymentLink: row.payment_link ?? undefined,
    reference: row.reference ?? undefined,
  }));
}

/**
 * Lease a pending reminder for delivery. The reminder stays pending until
 * {@link completeReminder}; a claim older than CLAIM_LEASE_MS can be taken again.
 * Returns false when another dispatcher holds it or it is no longer pending.
 */
export function claimReminder(id: number, now: Date = new Date()): boolean {
  const result = getDb()
    .prepare(
      `UPDATE reminder_events SET claimed_at = ?, attempts = attempts + 1
       WHERE id = ? AND status = 'pending' AND (claimed_at IS NULL OR claimed_at <= ?)`,
    )
    .run(now.toISOString(), id, leaseCutoff(now));
  return result.changes > 0;
}

/** pending → sent once the messenger accepted the message. */
export function completeReminder(id: number, now: Date = new Date()): boolean {
  const result = getDb()
    .prepare(
      `UPDATE reminder_events SET status = 'sent', sent_at = ?, claimed_at = NULL
       WHERE id = ? AND status = 'pending'`,
    )
    .run(now.toISOString(), id);
  return result.changes > 0;
}

/** Drop the claim after a failed delivery, keeping the error for the next attempt. */
export function releaseReminder(id: number, error: string): boolean {
  const result = getDb()
    .prepare(
      `UPDATE reminder_events SET claimed_at = NULL, last_error = ?
       WHERE id = ? AND status = 'pending'`,
    )
    .run(error, id);
  return result.changes > 0;
}

/** Mark every still-pending reminder of an instance obsolete. */
export function obsoletePendingReminders(billInstanceId: number): number {
  const result = getDb()
    .prepare("UPDATE reminder_events SET status = 'obsolete' WHERE bill_instance_id = ? AND status = 'pending'")
    .run(billInstanceId);
  return result.changes;
}
