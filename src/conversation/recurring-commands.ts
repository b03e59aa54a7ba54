/**
 * Recurring-management phrases: "pausar 3", "monto 3 50k", "recordatorios 3 3,1,0",
 * "hora 3 8", "pagado 12", "omitir 12".
 */

import { InvalidRecurringFieldError } from "../errors";
import { normalizeAmount } from "../parser/amount";
import { parseMonthDay, parseWeekday } from "../parser/dates";
import { foldText } from "../parser/text";
import type { RulePatch } from "../db/recurring-rules";
import type { Cadence, RecurringField } from "../types";

export type RecurringCommand =
  | { type: "pause"; ruleId: number }
  | { type: "activate"; ruleId: number }
  | { type: "cancel"; ruleId: number }
  | { type: "edit"; ruleId: number; field: RecurringField; value?: string }
  | { type: "paid"; instanceId: number }
  | { type: "skip"; instanceId: number };

const EDIT_VERBS: Record<string, RecurringField> = {
  dia: "billingDay",
  monto: "amount",
  valor: "amount",
  recordatorios: "reminderOffsets",
  hora: "reminderHour",
};

const MAX_OFFSET_DAYS = 60;
const MAX_INTERVAL_DAYS = 366;

/** Parse a recurring-management phrase. Returns null for anything else. */
export function parseRecurringCommand(text: string): RecurringCommand | null {
  const t = foldText(text).trim().replace(/\s+/g, " ");

  const simple = t.match(/^(pausar|activar|reanudar|cancelar|pagado|pagada|omitir) #?(\d+)$/);
  if (simple) {
    const id = Number.parseInt(simple[2], 10);
    switch (simple[1]) {
      case "pausar":
        return { type: "pause", ruleId: id };
      case "activar":
      case "reanudar":
        return { type: "activate", ruleId: id };
      case "cancelar":
        return { type: "cancel", ruleId: id };
      case "omitir":
        return { type: "skip", instanceId: id };
      default:
        return { type: "paid", instanceId: id };
    }
  }

  const edit = t.match(/^(dia|monto|valor|recordatorios|hora) #?(\d+)(?: (.+))?$/);
  if (edit) {
    const field = EDIT_VERBS[edit[1]];
    const ruleId = Number.parseInt(edit[2], 10);
    return edit[3] ? { type: "edit", ruleId, field, value: edit[3] } : { type: "edit", ruleId, field };
  }
  return null;
}

function parseInteger(text: string): number | null {
  return /^\d{1,3}$/.test(text) ? Number.parseInt(text, 10) : null;
}

/** "8", "8am", "8:00", "20h", "8 pm" → hour of day */
export function parseHour(text: string): number | null {
  const match = foldText(text)
    .trim()
    .match(/^(\d{1,2})(?::00)?\s*(am|pm|a\.m\.|p\.m\.|h)?$/);
  if (!match) return null;
  let hour = Number.parseInt(match[1], 10);
  const suffix = match[2]?.replace(/\./g, "");
  if (suffix === "pm" && hour < 12) hour += 12;
  if (suffix === "am" && hour === 12) hour = 0;
  return hour >= 0 && hour <= 23 ? hour : null;
}

/**
 * The billing date of a rule, read the way its cadence counts time:
 * a day of the month, a weekday, a day of the year or an interval in days.
 */
function parseSchedule(kind: Cadence["kind"], text: string): Cadence {
  switch (kind) {
    case "monthly": {
      const digits = text.match(/^(?:el |todos los |dia )?(\d{1,2})$/);
      const day = digits ? Number.parseInt(digits[1], 10) : NaN;
      if (!(day >= 1 && day <= 31)) {
        throw new InvalidRecurringFieldError("billingDay", "el día debe estar entre 1 y 31");
      }
      return { kind: "monthly", day };
    }
    case "weekly": {
      const weekday = parseWeekday(text);
      if (weekday === undefined) {
        throw new InvalidRecurringFieldError("billingDay", "escribe un día de la semana, como lunes");
      }
      return { kind: "weekly", weekday };
    }
    case "yearly": {
      const date = parseMonthDay(text);
      if (!date) throw new InvalidRecurringFieldError("billingDay", "escribe una fecha como 15 de marzo o 15/3");
      return { kind: "yearly", ...date };
    }
    case "custom": {
      const digits = text.match(/^(?:cada )?(\d{1,3})(?: dias)?$/);
      const intervalDays = digits ? Number.parseInt(digits[1], 10) : NaN;
      if (!(intervalDays >= 1 && intervalDays <= MAX_INTERVAL_DAYS)) {
        throw new InvalidRecurringFieldError("billingDay", `el intervalo debe estar entre 1 y ${MAX_INTERVAL_DAYS} días`);
      }
      return { kind: "custom", intervalDays };
    }
  }
}

/**
 * Parse the value of a field edit into a rule patch. The billing day is read
 * according to `cadence`, the kind of schedule the rule already has.
 * @throws InvalidRecurringFieldError when the value does not fit the field
 */
export function parseFieldValue(field: RecurringField, raw: string, cadence: Cadence["kind"] = "monthly"): RulePatch {
  const text = foldText(raw).trim();

  switch (field) {
    case "billingDay":
      return { cadence: parseSchedule(cadence, text) };
    case "reminderOffsets": {
      if (/^(ninguno|ninguna|sin recordatorios)$/.test(text)) return { reminderOffsets: [] };
      const parts = text.split(/\s*(?:,|;|\s|\by\b)\s*/).filter(Boolean);
      const offsets = parts.map(parseInteger);
      if (offsets.length === 0 || offsets.some((o) => o === null || o > MAX_OFFSET_DAYS)) {
        throw new InvalidRecurringFieldError(field, `usa días entre 0 y ${MAX_OFFSET_DAYS} separados por comas, como 3,1,0`);
      }
      return { reminderOffsets: offsets.filter((o): o is number => o !== null) };
    }
    case "reminderHour": {
      const hour = parseHour(text);
      if (hour === null) throw new InvalidRecurringFieldError(field, "la hora debe estar entre 0 y 23");
      return { reminderHour: hour };
    }
    case "amount": {
      const amount = normalizeAmount(text);
      if (amount === null || amount <= 0) throw new InvalidRecurringFieldError(field, "el monto debe ser mayor que cero");
      return { amount };
    }
  }
}
