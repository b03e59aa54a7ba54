/**
 * Due-date arithmetic for recurring rules. All dates are "YYYY-MM-DD" calendar days
 * in the rule's own timezone.
 */

import type { Cadence, RecurrenceHint } from "../types";
import { addDays, addMonths, clampDay, daysBetween, parts, toIsoDate, weekdayOf } from "../calendar";

export const WEEKDAY_NAMES = ["domingo", "lunes", "martes", "miércoles", "jueves", "viernes", "sábado"];

function latest(a: string, b: string): string {
  return a >= b ? a : b;
}

/**
 * First due date on or after `from`. Occurrences never precede `anchorDate`.
 * Monthly and yearly days are clamped to the month's length (31 → 30 in April, 29 → 28 in February).
 */
export function nextDueOnOrAfter(cadence: Cadence, anchorDate: string, from: string): string {
  const start = latest(from, anchorDate);
  const { year, month } = parts(start);

  switch (cadence.kind) {
    case "monthly": {
      const candidate = toIsoDate(year, month, clampDay(year, month, cadence.day));
      if (candidate >= start) return candidate;
      const next = addMonths(year, month, 1);
      return toIsoDate(next.year, next.month, clampDay(next.year, next.month, cadence.day));
    }
    case "weekly": {
      const diff = (cadence.weekday - weekdayOf(start) + 7) % 7;
      return addDays(start, diff);
    }
    case "yearly": {
      const candidate = toIsoDate(year, cadence.month, clampDay(year, cadence.month, cadence.day));
      if (candidate >= start) return candidate;
      return toIsoDate(year + 1, cadence.month, clampDay(year + 1, cadence.month, cadence.day));
    }
    case "custom": {
      const elapsed = daysBetween(anchorDate, start);
      const steps = Math.ceil(elapsed / cadence.intervalDays);
      return addDays(anchorDate, steps * cadence.intervalDays);
    }
  }
}

/**
 * Cadence for a recurrence hint. Fields the hint lacks are taken from `today`,
 * and `complete` is false so the caller can ask for them.
 */
export function cadenceFromHint(hint: RecurrenceHint, today: string): { cadence: Cadence; complete: boolean } {
  const { month, day } = parts(today);
  switch (hint.cadence) {
    case "monthly":
      return { cadence: { kind: "monthly", day: hint.day ?? day }, complete: hint.day !== undefined };
    case "weekly":
      return {
        cadence: { kind: "weekly", weekday: hint.weekday ?? weekdayOf(today) },
        complete: hint.weekday !== undefined,
      };
    case "yearly": {
      const complete = hint.month !== undefined && hint.day !== undefined;
      return {
        cadence: { kind: "yearly", month: hint.month ?? month, day: hint.day ?? day },
        complete,
      };
    }
    case "custom":
      return { cadence: { kind: "custom", intervalDays: hint.intervalDays }, complete: true };
  }
}

/** Storage key of the billing period a due date belongs to. */
export function periodKeyFor(cadence: Cadence, dueDate: string): string {
  if (cadence.kind === "monthly" || cadence.kind === "yearly") return dueDate.slice(0, 7);
  return dueDate;
}

export function describeCadence(cadence: Cadence): string {
  switch (cadence.kind) {
    case "monthly":
      return `cada mes el día ${cadence.day}`;
    case "weekly":
      return `cada ${WEEKDAY_NAMES[cadence.weekday] ?? "semana"}`;
    case "yearly":
      return `cada año el ${cadence.day}/${cadence.month}`;
    case "custom":
      return `cada ${cadence.intervalDays} días`;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isIntIn(value: unknown, min: number, max: number): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= min && value <= max;
}

/** Validate a cadence read from storage or user input. Returns null when malformed. */
export function parseCadence(value: unknown): Cadence | null {
  if (!isRecord(value)) return null;
  switch (value.kind) {
    case "monthly":
      return isIntIn(value.day, 1, 31) ? { kind: "monthly", day: value.day } : null;
    case "weekly":
      return isIntIn(value.weekday, 0, 6) ? { kind: "weekly", weekday: value.weekday } : null;
    case "yearly":
      return isIntIn(value.month, 1, 12) && isIntIn(value.day, 1, 31)
        ? { kind: "yearly", month: value.month, day: value.day }
        : null;
    case "custom":
      return isIntIn(value.intervalDays, 1, 3660) ? { kind: "custom", intervalDays: value.intervalDays } : null;
    default:
      return null;
  }
}
