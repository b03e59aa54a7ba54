/**
 * Reminder Dispatcher: delivers due reminders at least once.
 *
 * A reminder is leased before the send and only marked sent after the messenger
 * accepts it. A failed send drops the lease; a dispatcher that dies mid-send leaves
 * a lease that expires, so the reminder is picked up again.
 */

import { getDb } from "../db/connection";
import { claimReminder, completeReminder, listDueReminders, releaseReminder } from "../db/reminder-events";
import { closeInstance, getInstance, markReminded } from "../db/bill-instances";
import { getRule } from "../db/recurring-rules";
import { createEntry } from "../db/ledger";
import { todayIn } from "../calendar";
import { buildReminderText } from "./reminder-text";
import type { BillInstance, Messenger, SendResult } from "../types";

export interface DispatchedNotification {
  reminderId: number;
  instanceId: number;
  userId: string;
  ok: boolean;
  error?: string;
}

async function send(messenger: Messenger, userId: string, text: string): Promise<SendResult> {
  try {
    return await messenger.sendMessage(userId, text);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Send every reminder due at `now`. Returns one record per claimed reminder.
 */
export async function dispatchDue(messenger: Messenger, now: Date = new Date()): Promise<DispatchedNotification[]> {
  const results: DispatchedNotification[] = [];

  for (const due of listDueReminders(now)) {
    const reminderId = due.reminder.id;
    if (!claimReminder(reminderId, now)) continue;

    const result = await send(messenger, due.userId, buildReminderText(due, now));
    if (result.ok) {
      getDb().transaction(() => {
        completeReminder(reminderId, now);
        markReminded(due.instanceId, now);
      })();
      results.push({ reminderId, instanceId: due.instanceId, userId: due.userId, ok: true });
    } else {
      console.error(`Dispatcher: reminder ${reminderId} for ${due.userId} failed: ${result.error}`);
      releaseReminder(reminderId, result.error);
      results.push({ reminderId, instanceId: due.instanceId, userId: due.userId, ok: false, error: result.error });
    }
  }

  return results;
}

export interface PaidResult {
  instance: BillInstance;
  /** Ledger entry recorded for the payment, when the rule asks for one */
  entryId?: string;
}

/**
 * Mark an open instance paid and obsolete its pending reminders.
 * Records a ledger entry when the rule has autoAddTransaction.
 * Returns null when the instance does not exist, is not the user's, or is already closed.
 */
export function markInstancePaid(instanceId: number, now: Date = new Date(), userId?: string): PaidResult | null {
  const db = getDb();
  const run = db.transaction((): PaidResult | null => {
    const instance = getInstance(instanceId);
    if (!instance) return null;
    const rule = getRule(instance.ruleId);
    if (!rule || (userId !== undefined && rule.userId !== userId)) return null;
    if (instance.status !== "pending" && instance.status !== "reminded") return null;

    let entryId: string | undefined;
    const amount = instance.amount ?? rule.amount;
    if (rule.autoAddTransaction && amount > 0) {
      entryId = createEntry(
        rule.userId,
        {
          amounts: [{ value: amount, currency: rule.currency }],
          kind: "expense",
          category: rule.category,
          description: rule.serviceName,
          occurredOn: todayIn(rule.timezone, now),
          confidence: 1,
          source: "recurring",
          rawText: `pagado ${instanceId}`,
        },
        now,
      );
    }

    closeInstance(instanceId, "paid", { paidAt: now, entryId }, now);
    const updated = getInstance(instanceId);
    if (!updated) return null;
    return entryId ? { instance: updated, entryId } : { instance: updated };
  });
  return run();
}

/** Skip an open instance: status skipped, pending reminders obsolete. */
export function skipInstance(instanceId: number, now: Date = new Date(), userId?: string): BillInstance | null {
  const instance = getInstance(instanceId);
  if (!instance) return null;
  if (userId !== undefined && getRule(instance.ruleId)?.userId !== userId) return null;
  if (!closeInstance(instanceId, "skipped", {}, now)) return null;
  return getInstance(instanceId);
}
