/** Kind of money movement */
export type TransactionKind = "expense" | "income" | "loan" | "transfer";

/** How a draft was produced */
export type DraftSource = "rules" | "classifier" | "recurring";

/** A single amount with its currency */
export interface Money {
  value: number;
  currency: string;
}

/**
 * Recurrence detected in free text. Missing fields are asked for during setup.
 *   "todos los 5" → monthly day 5, "todos los lunes" → weekly weekday 1,
 *   "anual" → yearly, "quincenal" → every 14 days
 */
export type RecurrenceHint =
  | { cadence: "monthly"; day?: number }
  | { cadence: "weekly"; weekday?: number }
  | { cadence: "yearly"; month?: number; day?: number }
  | { cadence: "custom"; intervalDays: number };

/** An unconfirmed candidate ledger entry extracted from text */
export interface TransactionDraft {
  amounts: Money[];
  kind: TransactionKind;
  category: string;
  description: string;
  counterparty?: string;
  /** Date the movement happened (YYYY-MM-DD) */
  occurredOn: string;
  /** Next due date when the text describes a recurring bill (YYYY-MM-DD) */
  dueDate?: string;
  recurrence?: RecurrenceHint;
  /** Payment link found in the text of a recurring bill */
  paymentLink?: string;
  /** Payment reference or agreement number ("ref 123456") */
  paymentReference?: string;
  confidence: number;
  source: DraftSource;
  rawText: string;
}

/** A committed ledger entry */
export interface LedgerEntry {
  id: string;
  userId: string;
  kind: TransactionKind;
  amount: number;
  currency: string;
  category: string;
  description: string;
  counterparty?: string;
  occurredOn: string;
  confidence: number;
  source: DraftSource;
  rawText: string;
  isDeleted: boolean;
  deletedAt?: Date;
  createdAt: Date;
}

/** Fields of a recurring rule editable through a follow-up reply */
export type RecurringField = "billingDay" | "reminderOffsets" | "reminderHour" | "amount";

/** Questions a new recurring rule goes through, in order */
export type SetupStep = "schedule" | "reminderOffsets" | "reminderHour";

/** The state payload carried by each kind of pending action */
export type PendingState =
  | { type: "confirm_transaction"; drafts: TransactionDraft[] }
  | { type: "confirm_clear" }
  | { type: "confirm_clear_recurring" }
  | { type: "confirm_cancel_recurring"; ruleId: number }
  | { type: "awaiting_recurring_field"; ruleId: number; field: RecurringField }
  /** Walking a new rule through its setup questions; `queue` holds the next rules to set up */
  | { type: "recurring_setup"; ruleId: number; step: SetupStep; queue: number[] };

export type PendingActionType = PendingState["type"];

/** The single outstanding multi-step interaction held for a user */
export interface PendingAction {
  userId: string;
  state: PendingState;
  expiresAt: Date;
  createdAt: Date;
}

/** Billing cadence of a recurring rule */
export type Cadence =
  | { kind: "monthly"; day: number }
  | { kind: "weekly"; weekday: number }
  | { kind: "yearly"; month: number; day: number }
  | { kind: "custom"; intervalDays: number };

export type RecurringStatus = "pending" | "active" | "paused" | "canceled";

/** Durable definition of a periodic obligation */
export interface RecurringRule {
  id: number;
  userId: string;
  serviceName: string;
  category: string;
  amount: number;
  currency: string;
  cadence: Cadence;
  /** First occurrence; custom cadences step from here (YYYY-MM-DD) */
  anchorDate: string;
  timezone: string;
  /** Days before the due date, deduplicated and sorted descending */
  reminderOffsets: number[];
  reminderHour: number;
  paymentLink?: string;
  paymentReference?: string;
  nextDue?: string;
  status: RecurringStatus;
  autoAddTransaction: boolean;
  canceledAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type BillStatus = "pending" | "reminded" | "paid" | "skipped" | "canceled";

/** One concrete occurrence of a recurring rule for a billing period */
export interface BillInstance {
  id: number;
  ruleId: number;
  periodYear: number;
  periodMonth: number;
  /** Uniqueness key of the period: YYYY-MM, or the due date for sub-monthly cadences */
  periodKey: string;
  dueDate: string;
  status: BillStatus;
  amount?: number;
  paymentLink?: string;
  reference?: string;
  paidAt?: Date;
  entryId?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type ReminderStatus = "pending" | "sent" | "obsolete";

/** A scheduled notification tied to a bill instance */
export interface ReminderEvent {
  id: number;
  billInstanceId: number;
  offsetDays: number;
  /** UTC instant the reminder becomes due */
  scheduledFor: Date;
  status: ReminderStatus;
  attempts: number;
  lastError?: string;
  /** Set while a dispatcher holds the reminder for delivery */
  claimedAt?: Date;
  sentAt?: Date;
  createdAt: Date;
}

/** Result of a messaging adapter call */
export type SendResult = { ok: true } | { ok: false; error: string };

/** Outbound messaging collaborator */
export interface Messenger {
  sendMessage(userId: string, text: string): Promise<SendResult>;
}

/** Output of the natural-language classifier */
export interface ClassifierResult {
  drafts: TransactionDraft[];
  confidence: number;
}

/** External natural-language classifier */
export interface Classifier {
  classify(text: string, maxOutputTokens: number, signal?: AbortSignal): Promise<ClassifierResult>;
}
