import { describe, expect, test } from "vitest";
import {
  confirmDraftsText,
  describeDraft,
  isAffirmative,
  isCancelCommand,
  isNegative,
  summaryText,
} from "../../src/conversation/replies";
import type { TransactionDraft } from "../../src/types";

const lunch: TransactionDraft = {
  amounts: [{ value: 15000, currency: "COP" }],
  kind: "expense",
  category: "food_out",
  description: "almuerzo",
  occurredOn: "2026-10-19",
  confidence: 0.8,
  source: "rules",
  rawText: "almuerzo 15k",
};

describe("reply vocabulary", () => {
  test("affirmative and negative answers", () => {
    expect(isAffirmative("Sí")).toBe(true);
    expect(isAffirmative("de una!")).toBe(true);
    expect(isAffirmative("sí, pero cambia el monto")).toBe(false);
    expect(isNegative("NO.")).toBe(true);
    expect(isNegative("nop")).toBe(true);
    expect(isNegative("nunca")).toBe(false);
  });

  test("cancel command", () => {
    expect(isCancelCommand("/cancel")).toBe(true);
    expect(isCancelCommand("Cancelar.")).toBe(true);
    expect(isCancelCommand("cancelar 3")).toBe(false);
  });
});

describe("draft texts", () => {
  test("describeDraft", () => {
    expect(describeDraft(lunch)).toBe("Gasto $15.000 · almuerzo · [food_out] · 2026-10-19");
    expect(describeDraft({ ...lunch, kind: "loan", counterparty: "Juan" })).toBe(
      "Préstamo $15.000 · almuerzo · [food_out] · 2026-10-19 · con Juan",
    );
  });

  test("confirmation of one and several drafts", () => {
    expect(confirmDraftsText([lunch])).toBe(
      'Gasto $15.000 · almuerzo · [food_out] · 2026-10-19 (80%)\n¿Lo guardo? Responde "sí" o "no".',
    );
    const taxi = { ...lunch, amounts: [{ value: 8000, currency: "COP" }], category: "transport", description: "taxi" };
    expect(confirmDraftsText([lunch, taxi]).split("\n")).toEqual([
      "1. Gasto $15.000 · almuerzo · [food_out] · 2026-10-19 (80%)",
      "2. Gasto $8.000 · taxi · [transport] · 2026-10-19 (80%)",
      '¿Guardo estos movimientos? Responde "sí" o "no".',
    ]);
  });
});

describe("summaryText", () => {
  test("empty month", () => {
    expect(summaryText({ month: "2026-10", count: 0, byKind: [], byCategory: [] })).toBe("Sin movimientos en 2026-10.");
  });

  test("totals by kind and category", () => {
    const text = summaryText({
      month: "2026-10",
      count: 3,
      byKind: [
        { kind: "expense", currency: "COP", total: 23000, count: 2 },
        { kind: "income", currency: "COP", total: 2000000, count: 1 },
      ],
      byCategory: [
        { category: "food_out", currency: "COP", total: 15000, count: 1 },
        { category: "transport", currency: "COP", total: 8000, count: 1 },
      ],
    });
    expect(text.split("\n")).toEqual([
      "Resumen 2026-10 (3 movimientos):",
      "  Gasto: $23.000 (2)",
      "  Ingreso: $2.000.000 (1)",
      "Gastos por categoría:",
      "  food_out: $15.000 (1)",
      "  transport: $8.000 (1)",
    ]);
  });
});
