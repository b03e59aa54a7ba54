import { describe, expect, test } from "vitest";
import {
  ClassifierTimeoutError,
  ClassifierUnavailableError,
  DuplicateInstanceError,
  InputTooLongError,
  InvalidRecurringFieldError,
  isClassifierFailure,
  isLedgerError,
} from "../src/errors";

describe("errors", () => {
  test("carry a code and their own name", () => {
    const err = new InputTooLongError(1300, 1200);
    expect(err.code).toBe("INPUT_TOO_LONG");
    expect(err.name).toBe("InputTooLongError");
    expect(err.message).toBe("Input has 1300 characters, limit is 1200");
    expect(new DuplicateInstanceError(3, "2026-11").message).toBe(
      "Bill instance for rule 3 period 2026-11 already exists",
    );
  });

  test("isLedgerError", () => {
    expect(isLedgerError(new InvalidRecurringFieldError("amount", "bad"))).toBe(true);
    expect(isLedgerError(new Error("boom"))).toBe(false);
    expect(isLedgerError("boom")).toBe(false);
  });

  test("isClassifierFailure only matches classifier errors", () => {
    expect(isClassifierFailure(new ClassifierUnavailableError("exit 1"))).toBe(true);
    expect(isClassifierFailure(new ClassifierTimeoutError(20000))).toBe(true);
    expect(isClassifierFailure(new InputTooLongError(2, 1))).toBe(false);
  });
});
