/**
 * Plain-date helpers. Calendar dates travel as "YYYY-MM-DD" strings;
 * instants are Date objects in UTC. Zone conversion happens only here.
 */

import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import timezone from "dayjs/plugin/timezone";

dayjs.extend(utc);
dayjs.extend(timezone);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && dayjs.utc(value).isValid() && dayjs.utc(value).format("YYYY-MM-DD") === value;
}

export function toIsoDate(year: number, month: number, day: number): string {
  return `${year}-${pad(month)}-${pad(day)}`;
}

/** Calendar date of `now` as seen in the given IANA zone. */
export function todayIn(zone: string, now: Date): string {
  return dayjs(now).tz(zone).format("YYYY-MM-DD");
}

export function addDays(date: string, days: number): string {
  return dayjs.utc(date).add(days, "day").format("YYYY-MM-DD");
}

export function addMonths(year: number, month: number, months: number): { year: number; month: number } {
  const index = year * 12 + (month - 1) + months;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

export function daysInMonth(year: number, month: number): number {
  return dayjs.utc(toIsoDate(year, month, 1)).daysInMonth();
}

/** Day of month clamped to the month's length (31 in April → 30). */
export function clampDay(year: number, month: number, day: number): number {
  return Math.min(day, daysInMonth(year, month));
}

/** 0 = Sunday … 6 = Saturday */
export function weekdayOf(date: string): number {
  return dayjs.utc(date).day();
}

export function daysBetween(from: string, to: string): number {
  return dayjs.utc(to).diff(dayjs.utc(from), "day");
}

export function parts(date: string): { year: number; month: number; day: number } {
  const d = dayjs.utc(date);
  return { year: d.year(), month: d.month() + 1, day: d.date() };
}

/** UTC instant of `hour:00` local time on `date` in the given zone. */
export function zonedHourToUtc(date: string, hour: number, zone: string): Date {
  return dayjs.tz(`${date} ${pad(hour)}:00`, zone).toDate();
}

export function isValidTimezone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}
