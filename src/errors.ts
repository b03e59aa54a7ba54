/**
 * Error taxonomy for the ledger core.
 * Storage failures are not wrapped here: they surface as the driver's own errors.
 */

export type LedgerErrorCode =
  | "INPUT_TOO_LONG"
  | "CLASSIFIER_UNAVAILABLE"
  | "CLASSIFIER_TIMEOUT"
  | "INVALID_RECURRING_FIELD"
  | "DUPLICATE_INSTANCE";

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputTooLongError extends LedgerError {
  constructor(
    readonly length: number,
    readonly limit: number,
  ) {
    super("INPUT_TOO_LONG", `Input has ${length} characters, limit is ${limit}`);
  }
}

export class ClassifierUnavailableError extends LedgerError {
  constructor(message: string) {
    super("CLASSIFIER_UNAVAILABLE", message);
  }
}

export class ClassifierTimeoutError extends LedgerError {
  constructor(readonly timeoutMs: number) {
    super("CLASSIFIER_TIMEOUT", `Classifier did not answer within ${timeoutMs}ms`);
  }
}

export class InvalidRecurringFieldError extends LedgerError {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super("INVALID_RECURRING_FIELD", message);
  }
}

export class DuplicateInstanceError extends LedgerError {
  constructor(
    readonly ruleId: number,
    readonly periodKey: string,
  ) {
    super("DUPLICATE_INSTANCE", `Bill instance for rule ${ruleId} period ${periodKey} already exists`);
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

/** True for errors after which the message should be treated as unparsed. */
export function isClassifierFailure(
  error: unknown,
): error is ClassifierUnavailableError | ClassifierTimeoutError {
  return error instanceof ClassifierUnavailableError || error instanceof ClassifierTimeoutError;
}
