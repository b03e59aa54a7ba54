/**
 * Billing Instance Generator: materializes the next bill instance of every active
 * rule together with its reminder schedule. Safe to run any number of times.
 */

import { getDb } from "../db/connection";
import { insertInstance } from "../db/bill-instances";
import { insertReminder } from "../db/reminder-events";
import { listActiveRules, updateRule } from "../db/recurring-rules";
import { DuplicateInstanceError } from "../errors";
import { addDays, todayIn, zonedHourToUtc } from "../calendar";
import { nextDueOnOrAfter, periodKeyFor } from "./cadence";
import type { BillInstance, RecurringRule } from "../types";

/**
 * Due date the rule should have an instance for, as of the rule's local `today`.
 * A cached nextDue that has not passed is kept; otherwise the cadence is stepped
 * forward from the later of the day after it and today.
 */
export function candidateDueDate(rule: RecurringRule, today: string): string {
  if (rule.nextDue && rule.nextDue >= today) return rule.nextDue;
  const from = rule.nextDue ? addDays(rule.nextDue, 1) : today;
  return nextDueOnOrAfter(rule.cadence, rule.anchorDate, from >= today ? from : today);
}

/** UTC instants of the reminders of a due date, skipping days already past in the rule's zone. */
export function reminderSchedule(rule: RecurringRule, dueDate: string, today: string): { offset: number; at: Date }[] {
  const schedule: { offset: number; at: Date }[] = [];
  for (const offset of rule.reminderOffsets) {
    const day = addDays(dueDate, -offset);
    if (day < today) continue;
    schedule.push({ offset, at: zonedHourToUtc(day, rule.reminderHour, rule.timezone) });
  }
  return schedule;
}

/**
 * Create the current instance of one rule. Returns null when it already exists.
 * Amount, link and reference stay unset so the rule's current values apply until
 * a period gets its own.
 */
export function generateForRule(rule: RecurringRule, asOf: Date): BillInstance | null {
  const today = todayIn(rule.timezone, asOf);
  const dueDate = candidateDueDate(rule, today);

  const run = getDb().transaction((): BillInstance | null => {
    let instance: BillInstance;
    try {
      instance = insertInstance(
        {
          ruleId: rule.id,
          periodKey: periodKeyFor(rule.cadence, dueDate),
          dueDate,
        },
        asOf,
      );
    } catch (err) {
      if (err instanceof DuplicateInstanceError) {
        if (rule.nextDue !== dueDate) updateRule(rule.id, { nextDue: dueDate }, asOf);
        return null;
      }
      throw err;
    }

    for (const { offset, at } of reminderSchedule(rule, dueDate, today)) {
      insertReminder(instance.id, offset, at, asOf);
    }
    updateRule(rule.id, { nextDue: dueDate }, asOf);
    return instance;
  });
  return run();
}

/**
 * Create the due bill instances of all active rules as of `asOf`.
 * Returns only the instances created by this call.
 */
export function generateDue(asOf: Date = new Date()): BillInstance[] {
  const created: BillInstance[] = [];
  for (const rule of listActiveRules()) {
    const instance = generateForRule(rule, asOf);
    if (instance) created.push(instance);
  }
  return created;
}
