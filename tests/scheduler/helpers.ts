import { createRule, type NewRecurringRule } from "../../src/db/recurring-rules";
import type { RecurringRule } from "../../src/types";

export const USER = "user-1";

/** 10:00 in Bogotá */
export const NOW = new Date("2026-10-19T15:00:00Z");

export function makeRule(overrides: Partial<NewRecurringRule> = {}): RecurringRule {
  return createRule(
    {
      userId: USER,
      serviceName: "netflix",
      category: "subscriptions",
      amount: 45000,
      currency: "COP",
      cadence: { kind: "monthly", day: 5 },
      anchorDate: "2026-10-01",
      timezone: "America/Bogota",
      reminderOffsets: [3, 1, 0],
      reminderHour: 9,
      ...overrides,
    },
    NOW,
  );
}
