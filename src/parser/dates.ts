/**
 * Relative and colloquial date resolution ("ayer", "el 5", "5 de octubre") and
 * recurrence phrases ("todos los 5", "todos los lunes", "quincenal", "anual").
 */

import { addDays, addMonths, clampDay, daysInMonth, isIsoDate, parts, toIsoDate } from "../calendar";
import type { RecurrenceHint } from "../types";
import { foldText } from "./text";

const MONTHS: Record<string, number> = {
  ene: 1,
  feb: 2,
  mar: 3,
  abr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  ago: 8,
  sep: 9,
  set: 9,
  oct: 10,
  nov: 11,
  dic: 12,
};

/** Sunday = 0, matching Date.getDay */
const WEEKDAYS: Record<string, number> = {
  domingo: 0,
  lunes: 1,
  martes: 2,
  miercoles: 3,
  jueves: 4,
  viernes: 5,
  sabado: 6,
};

const WEEKDAY_ABBREVIATIONS: Record<string, number> = {
  dom: 0,
  lun: 1,
  mar: 2,
  mie: 3,
  jue: 4,
  vie: 5,
  sab: 6,
};

const WEEKDAY_PATTERN = "(domingo|lunes|martes|miercoles|jueves|viernes|sabado)s?";
const MONTH_PATTERN =
  "(enero|febrero|marzo|abril|mayo|junio|julio|agosto|septiembre|setiembre|octubre|noviembre|diciembre|ene|feb|mar|abr|may|jun|jul|ago|sep|set|oct|nov|dic)";

export interface ResolvedDate {
  /** Date the movement happened, defaults to today */
  occurredOn: string;
  /** True when the text named a date explicitly */
  explicit: boolean;
  recurrence?: RecurrenceHint;
}

function validDay(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const day = Number.parseInt(value, 10);
  return day >= 1 && day <= 31 ? day : undefined;
}

/** "lunes", "el martes", "todos los viernes", "sáb" → weekday (Sunday = 0). */
export function parseWeekday(text: string): number | undefined {
  const t = foldText(text).trim().replace(/\s+/g, " ").replace(/\.$/, "");
  const match = t.match(/^(?:(?:todos )?(?:el|los|cada) )?([a-z]+)$/);
  if (!match) return undefined;
  const word = match[1];
  return WEEKDAYS[word] ?? WEEKDAYS[word.replace(/s$/, "")] ?? WEEKDAY_ABBREVIATIONS[word];
}

/** "15 de marzo", "15 mar", "15/3" → month and day. Feb 29 is accepted and clamped by the cadence. */
export function parseMonthDay(text: string): { month: number; day: number } | undefined {
  const t = foldText(text).trim().replace(/\s+/g, " ");
  const named = t.match(new RegExp(`^(?:el )?(\\d{1,2}) (?:de )?${MONTH_PATTERN}\\.?$`));
  const slashed = t.match(/^(?:el )?(\d{1,2})[/-](\d{1,2})$/);

  let day: number | undefined;
  let month: number | undefined;
  if (named) {
    day = validDay(named[1]);
    month = MONTHS[named[2].slice(0, 3)];
  } else if (slashed) {
    day = validDay(slashed[1]);
    const m = Number.parseInt(slashed[2], 10);
    month = m >= 1 && m <= 12 ? m : undefined;
  }
  if (day === undefined || month === undefined) return undefined;
  // leap year, so Feb 29 passes
  if (day > daysInMonth(2024, month)) return undefined;
  return { month, day };
}

/** Recurrence mentioned in the text, with whatever schedule detail it states. */
export function detectRecurrence(text: string): RecurrenceHint | undefined {
  const t = foldText(text);

  if (/\b(quincenal|quincenalmente|cada\s+quince\s+dias|cada\s+dos\s+semanas)\b/.test(t)) {
    return { cadence: "custom", intervalDays: 14 };
  }
  const every = t.match(/\bcada\s+(\d{1,3})\s+(dias|semanas)\b/);
  if (every) {
    const count = Number.parseInt(every[1], 10);
    const intervalDays = every[2] === "semanas" ? count * 7 : count;
    if (intervalDays >= 1) return { cadence: "custom", intervalDays };
  }

  const weekday = t.match(new RegExp(`\\b(?:todos\\s+los|cada|los)\\s+${WEEKDAY_PATTERN}\\b`));
  if (weekday) return { cadence: "weekly", weekday: WEEKDAYS[weekday[1]] };
  if (/\b(semanal|semanalmente|cada\s+semana|a\s+la\s+semana)\b/.test(t)) return { cadence: "weekly" };

  if (/\b(anual|anualmente|cada\s+ano|al\s+ano)\b/.test(t)) {
    const named = t.match(new RegExp(`\\b(\\d{1,2})\\s+de\\s+${MONTH_PATTERN}\\b`));
    const date = named ? parseMonthDay(`${named[1]} de ${named[2]}`) : undefined;
    return date ? { cadence: "yearly", ...date } : { cadence: "yearly" };
  }

  const dayMatch =
    t.match(/\btodos\s+los\s+(\d{1,2})\b/) ??
    t.match(/\bel\s+(\d{1,2})\s+de\s+cada\s+mes\b/) ??
    t.match(/\bcada\s+(\d{1,2})\b(?!\s*(?:dias|semanas|meses))/);
  const day = validDay(dayMatch?.[1]);
  if (day !== undefined) return { cadence: "monthly", day };

  if (/\b(mensual|mensualmente|cada\s+mes|al\s+mes|suscripcion)\b/.test(t)) {
    return { cadence: "monthly" };
  }
  return undefined;
}

/**
 * Resolve the date a message refers to, relative to `today` (YYYY-MM-DD in the user's zone).
 * "el 5" names the most recent 5th, so a day later than today falls in the previous month.
 */
export function resolveDate(text: string, today: string): ResolvedDate {
  const t = foldText(text ?? "");
  const recurrence = detectRecurrence(text ?? "");
  const now = parts(today);

  const result = (occurredOn: string, explicit: boolean): ResolvedDate =>
    recurrence ? { occurredOn, explicit, recurrence } : { occurredOn, explicit };

  const iso = t.match(/\b(\d{4}-\d{2}-\d{2})\b/);
  if (iso && isIsoDate(iso[1])) return result(iso[1], true);

  if (/\banteayer\b/.test(t)) return result(addDays(today, -2), true);
  if (/\b(ayer|anoche)\b/.test(t)) return result(addDays(today, -1), true);
  if (/\bhoy\b/.test(t)) return result(today, true);

  const named = t.match(
    /\b(\d{1,2})\s*(?:de\s+)?(enero|febrero|marzo|abril|mayo|junio|julio|agosto|septiembre|setiembre|octubre|noviembre|diciembre|ene|feb|mar|abr|may|jun|jul|ago|sep|set|oct|nov|dic)\b\.?(?:\s+(?:de\s+)?(\d{4}))?/,
  );
  // a yearly bill's date is its due date, not the day of the movement
  const yearlyDate = recurrence?.cadence === "yearly" && recurrence.day !== undefined;
  if (named && !yearlyDate) {
    const day = validDay(named[1]);
    const month = MONTHS[named[2].slice(0, 3)];
    const year = named[3] ? Number.parseInt(named[3], 10) : now.year;
    if (day !== undefined && month !== undefined) {
      return result(toIsoDate(year, month, clampDay(year, month, day)), true);
    }
  }

  const slashed = t.match(/\b(\d{1,2})\/(\d{1,2})(?:\/(\d{4}))?\b/);
  if (slashed) {
    const day = validDay(slashed[1]);
    const month = Number.parseInt(slashed[2], 10);
    const year = slashed[3] ? Number.parseInt(slashed[3], 10) : now.year;
    if (day !== undefined && month >= 1 && month <= 12) {
      return result(toIsoDate(year, month, clampDay(year, month, day)), true);
    }
  }

  if (!recurrence) {
    const bare = t.match(/\bel\s+(?:dia\s+)?(\d{1,2})\b(?!\s*(?:k|mil|de\s+cada))/);
    const day = validDay(bare?.[1]);
    if (day !== undefined) {
      let { year, month } = now;
      if (day > now.day) ({ year, month } = addMonths(year, month, -1));
      return result(toIsoDate(year, month, clampDay(year, month, day)), true);
    }
  }

  return result(today, false);
}
