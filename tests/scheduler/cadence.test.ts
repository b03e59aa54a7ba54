import { describe, expect, test } from "vitest";
import { cadenceFromHint, describeCadence, nextDueOnOrAfter, parseCadence, periodKeyFor } from "../../src/scheduler/cadence";

describe("nextDueOnOrAfter", () => {
  test("monthly: this month when the day is still ahead, else next month", () => {
    expect(nextDueOnOrAfter({ kind: "monthly", day: 25 }, "2026-01-01", "2026-10-19")).toBe("2026-10-25");
    expect(nextDueOnOrAfter({ kind: "monthly", day: 5 }, "2026-01-01", "2026-10-19")).toBe("2026-11-05");
    expect(nextDueOnOrAfter({ kind: "monthly", day: 19 }, "2026-01-01", "2026-10-19")).toBe("2026-10-19");
  });

  test("monthly: day 31 is clamped to short months", () => {
    expect(nextDueOnOrAfter({ kind: "monthly", day: 31 }, "2026-01-01", "2026-04-10")).toBe("2026-04-30");
    expect(nextDueOnOrAfter({ kind: "monthly", day: 31 }, "2026-01-01", "2027-02-01")).toBe("2027-02-28");
    expect(nextDueOnOrAfter({ kind: "monthly", day: 31 }, "2026-01-01", "2028-02-01")).toBe("2028-02-29");
  });

  test("never before the anchor date", () => {
    expect(nextDueOnOrAfter({ kind: "monthly", day: 5 }, "2026-12-20", "2026-10-19")).toBe("2027-01-05");
  });

  test("weekly", () => {
    expect(nextDueOnOrAfter({ kind: "weekly", weekday: 1 }, "2026-01-01", "2026-10-19")).toBe("2026-10-19");
    expect(nextDueOnOrAfter({ kind: "weekly", weekday: 5 }, "2026-01-01", "2026-10-19")).toBe("2026-10-23");
  });

  test("yearly, with February 29 clamped", () => {
    expect(nextDueOnOrAfter({ kind: "yearly", month: 12, day: 1 }, "2026-01-01", "2026-10-19")).toBe("2026-12-01");
    expect(nextDueOnOrAfter({ kind: "yearly", month: 2, day: 29 }, "2026-01-01", "2026-03-01")).toBe("2027-02-28");
  });

  test("custom intervals step from the anchor", () => {
    expect(nextDueOnOrAfter({ kind: "custom", intervalDays: 14 }, "2026-10-01", "2026-10-19")).toBe("2026-10-29");
    expect(nextDueOnOrAfter({ kind: "custom", intervalDays: 14 }, "2026-10-01", "2026-10-15")).toBe("2026-10-15");
    expect(nextDueOnOrAfter({ kind: "custom", intervalDays: 14 }, "2026-10-01", "2026-09-01")).toBe("2026-10-01");
  });
});

describe("cadenceFromHint", () => {
  test("a complete hint is used as is", () => {
    expect(cadenceFromHint({ cadence: "monthly", day: 5 }, "2026-10-19")).toEqual({
      cadence: { kind: "monthly", day: 5 },
      complete: true,
    });
    expect(cadenceFromHint({ cadence: "custom", intervalDays: 14 }, "2026-10-19")).toEqual({
      cadence: { kind: "custom", intervalDays: 14 },
      complete: true,
    });
  });

  test("missing details come from today and mark the cadence incomplete", () => {
    expect(cadenceFromHint({ cadence: "weekly" }, "2026-10-19")).toEqual({
      cadence: { kind: "weekly", weekday: 1 },
      complete: false,
    });
    expect(cadenceFromHint({ cadence: "yearly" }, "2026-10-19")).toEqual({
      cadence: { kind: "yearly", month: 10, day: 19 },
      complete: false,
    });
  });
});

describe("periodKeyFor", () => {
  test("month for monthly and yearly, the date otherwise", () => {
    expect(periodKeyFor({ kind: "monthly", day: 5 }, "2026-11-05")).toBe("2026-11");
    expect(periodKeyFor({ kind: "yearly", month: 11, day: 5 }, "2026-11-05")).toBe("2026-11");
    expect(periodKeyFor({ kind: "weekly", weekday: 4 }, "2026-11-05")).toBe("2026-11-05");
  });
});

describe("describeCadence", () => {
  test("Spanish descriptions", () => {
    expect(describeCadence({ kind: "monthly", day: 5 })).toBe("cada mes el día 5");
    expect(describeCadence({ kind: "weekly", weekday: 1 })).toBe("cada lunes");
    expect(describeCadence({ kind: "custom", intervalDays: 14 })).toBe("cada 14 días");
  });
});

describe("parseCadence", () => {
  test("accepts well-formed cadences", () => {
    expect(parseCadence({ kind: "monthly", day: 31 })).toEqual({ kind: "monthly", day: 31 });
    expect(parseCadence({ kind: "yearly", month: 2, day: 29 })).toEqual({ kind: "yearly", month: 2, day: 29 });
  });

  test("rejects malformed ones", () => {
    expect(parseCadence({ kind: "monthly", day: 32 })).toBeNull();
    expect(parseCadence({ kind: "weekly", weekday: 7 })).toBeNull();
    expect(parseCadence({ kind: "custom", intervalDays: 0 })).toBeNull();
    expect(parseCadence({ kind: "daily" })).toBeNull();
    expect(parseCadence("monthly")).toBeNull();
  });
});
