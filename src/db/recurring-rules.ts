import { getDb } from "./connection";
import { cancelOpenInstances } from "./bill-instances";
import { InvalidRecurringFieldError } from "../errors";
import { isIsoDate, isValidTimezone } from "../calendar";
import { parseCadence } from "../scheduler/cadence";
import { foldText } from "../parser/text";
import type { Cadence, RecurringRule, RecurringStatus } from "../types";

interface RuleRow {
  id: number;
  user_id: string;
  service_name: string;
  category: string;
  amount: number;
  currency: string;
  cadence: string;
  anchor_date: string;
  timezone: string;
  reminder_offsets: string;
  reminder_hour: number;
  payment_link: string | null;
  payment_reference: string | null;
  next_due: string | null;
  status: RecurringStatus;
  auto_add_transaction: number;
  canceled_at: string | null;
  created_at: string;
  updated_at: string;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function rowToRule(row: RuleRow): RecurringRule {
  const cadence = parseCadence(parseJson(row.cadence));
  if (!cadence) throw new Error(`Recurring rule ${row.id} has an invalid cadence: ${row.cadence}`);
  const offsets = parseJson(row.reminder_offsets);

  return {
    id: row.id,
    userId: row.user_id,
    serviceName: row.service_name,
    category: row.category,
    amount: row.amount,
    currency: row.currency,
    cadence,
    anchorDate: row.anchor_date,
    timezone: row.timezone,
    reminderOffsets: Array.isArray(offsets) ? normalizeOffsets(offsets) : [],
    reminderHour: row.reminder_hour,
    paymentLink: row.payment_link ?? undefined,
    paymentReference: row.payment_reference ?? undefined,
    nextDue: row.next_due ?? undefined,
    status: row.status,
    autoAddTransaction: row.auto_add_transaction === 1,
    canceledAt: row.canceled_at ? new Date(row.canceled_at) : undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/** Non-negative integers, deduplicated, largest first ([0, 3, 1, 3] → [3, 1, 0]). */
export function normalizeOffsets(values: unknown[]): number[] {
  const valid = values.filter((v): v is number => typeof v === "number" && Number.isInteger(v) && v >= 0);
  return [...new Set(valid)].sort((a, b) => b - a);
}

function assertHour(hour: number): void {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new InvalidRecurringFieldError("reminderHour", `Reminder hour must be 0-23, got ${hour}`);
  }
}

function assertAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new InvalidRecurringFieldError("amount", `Amount must be a non-negative number, got ${amount}`);
  }
}

export interface NewRecurringRule {
  userId: string;
  serviceName: string;
  category: string;
  amount: number;
  currency: string;
  cadence: Cadence;
  anchorDate: string;
  timezone: string;
  reminderOffsets: number[];
  reminderHour: number;
  paymentLink?: string;
  paymentReference?: string;
  status?: RecurringStatus;
  autoAddTransaction?: boolean;
}

/**
 * Create a rule.
 * @throws InvalidRecurringFieldError on an unknown timezone, bad hour, amount or anchor date
 */
export function createRule(input: NewRecurringRule, now: Date = new Date()): RecurringRule {
  if (!isValidTimezone(input.timezone)) {
    throw new InvalidRecurringFieldError("timezone", `Unknown timezone: ${input.timezone}`);
  }
  if (!isIsoDate(input.anchorDate)) {
    throw new InvalidRecurringFieldError("anchorDate", `Invalid anchor date: ${input.anchorDate}`);
  }
  assertHour(input.reminderHour);
  assertAmount(input.amount);

  const stamp = now.toISOString();
  const result = getDb()
    .prepare(
      `INSERT INTO recurring_rules
         (user_id, service_name, category, amount, currency, cadence, anchor_date, timezone,
          reminder_offsets, reminder_hour, payment_link, payment_reference, status, auto_add_transaction,
          created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      input.userId,
      input.serviceName,
      input.category,
      input.amount,
      input.currency,
      JSON.stringify(input.cadence),
      input.anchorDate,
      input.timezone,
      JSON.stringify(normalizeOffsets(input.reminderOffsets)),
      input.reminderHour,
      input.paymentLink ?? null,
      input.paymentReference ?? null,
      input.status ?? "active",
      input.autoAddTransaction === false ? 0 : 1,
      stamp,
      stamp,
    );

  const rule = getRule(Number(result.lastInsertRowid));
  if (!rule) throw new Error("Recurring rule vanished after insert");
  return rule;
}

export function getRule(id: number): RecurringRule | null {
  const row = getDb().prepare<[number], RuleRow>("SELECT * FROM recurring_rules WHERE id = ?").get(id);
  return row ? rowToRule(row) : null;
}

/** A rule only if it belongs to the user. */
export function getUserRule(userId: string, id: number): RecurringRule | null {
  const rule = getRule(id);
  return rule && rule.userId === userId ? rule : null;
}

export function listRules(userId: string, opts: { includeCanceled?: boolean } = {}): RecurringRule[] {
  const sql = opts.includeCanceled
    ? "SELECT * FROM recurring_rules WHERE user_id = ? ORDER BY id"
    : "SELECT * FROM recurring_rules WHERE user_id = ? AND status != 'canceled' ORDER BY id";
  return getDb().prepare<[string], RuleRow>(sql).all(userId).map(rowToRule);
}

/**
 * The user's live rule for a service, compared without case or accents
 * ("Netflix" and "netflix" are the same bill).
 */
export function findRuleByService(userId: string, serviceName: string): RecurringRule | null {
  const wanted = foldText(serviceName).trim();
  return listRules(userId).find((rule) => foldText(rule.serviceName).trim() === wanted) ?? null;
}

/** Every active rule across users, for the generator. */
export function listActiveRules(): RecurringRule[] {
  return getDb()
    .prepare<[], RuleRow>("SELECT * FROM recurring_rules WHERE status = 'active' ORDER BY id")
    .all()
    .map(rowToRule);
}

export interface RulePatch {
  serviceName?: string;
  category?: string;
  amount?: number;
  cadence?: Cadence;
  reminderOffsets?: number[];
  reminderHour?: number;
  paymentLink?: string | null;
  paymentReference?: string | null;
  nextDue?: string | null;
  autoAddTransaction?: boolean;
}

/**
 * Apply a partial update. A cadence change resets the cached next due date.
 * @throws InvalidRecurringFieldError on a bad hour or amount
 */
export function updateRule(id: number, patch: RulePatch, now: Date = new Date()): RecurringRule | null {
  const sets: string[] = [];
  const params: (string | number | null)[] = [];
  const set = (column: string, value: string | number | null) => {
    sets.push(`${column} = ?`);
    params.push(value);
  };

  if (patch.serviceName !== undefined) set("service_name", patch.serviceName);
  if (patch.category !== undefined) set("category", patch.category);
  if (patch.amount !== undefined) {
    assertAmount(patch.amount);
    set("amount", patch.amount);
  }
  if (patch.cadence !== undefined) {
    set("cadence", JSON.stringify(patch.cadence));
    if (patch.nextDue === undefined) set("next_due", null);
  }
  if (patch.reminderOffsets !== undefined) set("reminder_offsets", JSON.stringify(normalizeOffsets(patch.reminderOffsets)));
  if (patch.reminderHour !== undefined) {
    assertHour(patch.reminderHour);
    set("reminder_hour", patch.reminderHour);
  }
  if (patch.paymentLink !== undefined) set("payment_link", patch.paymentLink);
  if (patch.paymentReference !== undefined) set("payment_reference", patch.paymentReference);
  if (patch.nextDue !== undefined) set("next_due", patch.nextDue);
  if (patch.autoAddTransaction !== undefined) set("auto_add_transaction", patch.autoAddTransaction ? 1 : 0);

  if (sets.length === 0) return getRule(id);
  set("updated_at", now.toISOString());
  params.push(id);
  getDb().prepare(`UPDATE recurring_rules SET ${sets.join(", ")} WHERE id = ?`).run(...params);
  return getRule(id);
}

/**
 * Change a rule's status. Canceling also cancels its open bill instances
 * and obsoletes their pending reminders. A canceled rule stays canceled.
 */
export function setRuleStatus(id: number, status: RecurringStatus, now: Date = new Date()): RecurringRule | null {
  const db = getDb();
  const run = db.transaction(() => {
    const current = getRule(id);
    if (!current) return null;
    if (current.status === "canceled" && status !== "canceled") return current;

    const stamp = now.toISOString();
    if (status === "canceled") {
      db.prepare("UPDATE recurring_rules SET status = 'canceled', canceled_at = ?, updated_at = ? WHERE id = ?").run(
        stamp,
        stamp,
        id,
      );
      cancelOpenInstances(id, now);
    } else {
      db.prepare("UPDATE recurring_rules SET status = ?, updated_at = ? WHERE id = ?").run(status, stamp, id);
    }
    return getRule(id);
  });
  return run();
}

/** Cancel every non-canceled rule of a user. Returns how many were canceled. */
export function cancelAllRules(userId: string, now: Date = new Date()): number {
  const rules = listRules(userId);
  const run = getDb().transaction(() => {
    for (const rule of rules) setRuleStatus(rule.id, "canceled", now);
  });
  run();
  return rules.length;
}
