import { getDb } from "./connection";
import { DuplicateInstanceError } from "../errors";
import { obsoletePendingReminders } from "./reminder-events";
import type { BillInstance, BillStatus } from "../types";

interface InstanceRow {
  id: number;
  rule_id: number;
  period_year: number;
  period_month: number;
  period_key: string;
  due_date: string;
  status: BillStatus;
  amount: number | null;
  payment_link: string | null;
  reference: string | null;
  paid_at: string | null;
  entry_id: string | null;
  created_at: string;
  updated_at: string;
}

function rowToInstance(row: InstanceRow): BillInstance {
  return {
    id: row.id,
    ruleId: row.rule_id,
    periodYear: row.period_year,
    periodMonth: row.period_month,
    periodKey: row.period_key,
    dueDate: row.due_date,
    status: row.status,
    amount: row.amount ?? undefined,
    paymentLink: row.payment_link ?? undefined,
    reference: row.reference ?? undefined,
    paidAt: row.paid_at ? new Date(row.paid_at) : undefined,
    entryId: row.entry_id ?? undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/** Statuses that still expect a payment */
export const OPEN_STATUSES: BillStatus[] = ["pending", "reminded"];

export interface NewBillInstance {
  ruleId: number;
  periodKey: string;
  dueDate: string;
  amount?: number;
  paymentLink?: string;
  reference?: string;
}

/**
 * Create the instance for a rule's billing period.
 * @throws DuplicateInstanceError when the period already has one
 */
export function insertInstance(input: NewBillInstance, now: Date = new Date()): BillInstance {
  const db = getDb();
  const year = Number.parseInt(input.dueDate.slice(0, 4), 10);
  const month = Number.parseInt(input.dueDate.slice(5, 7), 10);
  const stamp = now.toISOString();

  const result = db
    .prepare(
      `INSERT INTO bill_instances
         (rule_id, period_year, period_month, period_key, due_date, status, amount, payment_link, reference,
          created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, 'pending', ?, ?, ?, ?, ?)
       ON CONFLICT(rule_id, period_key) DO NOTHING`,
    )
    .run(
      input.ruleId,
      year,
      month,
      input.periodKey,
      input.dueDate,
      input.amount ?? null,
      input.paymentLink ?? null,
      input.reference ?? null,
      stamp,
      stamp,
    );

  if (result.changes === 0) throw new DuplicateInstanceError(input.ruleId, input.periodKey);

  const created = getInstance(Number(result.lastInsertRowid));
  if (!created) throw new Error(`Bill instance for rule ${input.ruleId} vanished after insert`);
  return created;
}

export function getInstance(id: number): BillInstance | null {
  const row = getDb().prepare<[number], InstanceRow>("SELECT * FROM bill_instances WHERE id = ?").get(id);
  return row ? rowToInstance(row) : null;
}

export function listInstances(ruleId: number): BillInstance[] {
  return getDb()
    .prepare<[number], InstanceRow>("SELECT * FROM bill_instances WHERE rule_id = ? ORDER BY due_date")
    .all(ruleId)
    .map(rowToInstance);
}

/** Open instances of a user's rules, soonest first. */
export function listOpenInstancesForUser(userId: string): BillInstance[] {
  return getDb()
    .prepare<[string], InstanceRow>(
      `SELECT b.* FROM bill_instances b
       JOIN recurring_rules r ON r.id = b.rule_id
       WHERE r.user_id = ? AND b.status IN ('pending', 'reminded')
       ORDER BY b.due_date, b.id`,
    )
    .all(userId)
    .map(rowToInstance);
}

/** pending → reminded after the first successful reminder. */
export function markReminded(id: number, now: Date = new Date()): boolean {
  const result = getDb()
    .prepare("UPDATE bill_instances SET status = 'reminded', updated_at = ? WHERE id = ? AND status = 'pending'")
    .run(now.toISOString(), id);
  return result.changes > 0;
}

export interface CloseOptions {
  paidAt?: Date;
  entryId?: string;
}

/**
 * Move an open instance to a closed status and obsolete its pending reminders.
 * Returns false when the instance was not open.
 */
export function closeInstance(
  id: number,
  status: Exclude<BillStatus, "pending" | "reminded">,
  opts: CloseOptions = {},
  now: Date = new Date(),
): boolean {
  const db = getDb();
  const run = db.transaction(() => {
    const result = db
      .prepare(
        `UPDATE bill_instances SET status = ?, paid_at = ?, entry_id = ?, updated_at = ?
         WHERE id = ? AND status IN ('pending', 'reminded')`,
      )
      .run(status, opts.paidAt?.toISOString() ?? null, opts.entryId ?? null, now.toISOString(), id);
    if (result.changes === 0) return false;
    obsoletePendingReminders(id);
    return true;
  });
  return run();
}

/** Cancel every open instance of a rule. Returns how many were canceled. */
export function cancelOpenInstances(ruleId: number, now: Date = new Date()): number {
  const open = getDb()
    .prepare<[number], { id: number }>(
      "SELECT id FROM bill_instances WHERE rule_id = ? AND status IN ('pending', 'reminded')",
    )
    .all(ruleId);
  let canceled = 0;
  for (const { id } of open) {
    if (closeInstance(id, "canceled", {}, now)) canceled++;
  }
  return canceled;
}
