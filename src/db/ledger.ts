import { randomUUID } from "node:crypto";
import { getDb } from "./connection";
import type { DraftSource, LedgerEntry, TransactionDraft, TransactionKind } from "../types";

interface LedgerRow {
  id: string;
  user_id: string;
  kind: TransactionKind;
  amount: number;
  currency: string;
  category: string;
  description: string;
  counterparty: string | null;
  occurred_on: string;
  confidence: number;
  source: DraftSource;
  raw_text: string;
  is_deleted: number;
  deleted_at: string | null;
  created_at: string;
}

/** Convert a DB row to a LedgerEntry. */
export function rowToEntry(row: LedgerRow): LedgerEntry {
  return {
    id: row.id,
    userId: row.user_id,
    kind: row.kind,
    amount: row.amount,
    currency: row.currency,
    category: row.category,
    description: row.description,
    counterparty: row.counterparty ?? undefined,
    occurredOn: row.occurred_on,
    confidence: row.confidence,
    source: row.source,
    rawText: row.raw_text,
    isDeleted: row.is_deleted === 1,
    deletedAt: row.deleted_at ? new Date(row.deleted_at) : undefined,
    createdAt: new Date(row.created_at),
  };
}

/** Total of a draft's amounts, rounded to cents. */
export function draftTotal(draft: TransactionDraft): number {
  const sum = draft.amounts.reduce((acc, m) => acc + m.value, 0);
  return Math.round(sum * 100) / 100;
}

const INSERT_SQL = `
  INSERT INTO ledger_entries
    (id, user_id, kind, amount, currency, category, description, counterparty,
     occurred_on, confidence, source, raw_text, created_at)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

/** Commit a draft as a ledger entry. Returns the new entry id. */
export function createEntry(userId: string, draft: TransactionDraft, now: Date = new Date()): string {
  if (draft.amounts.length === 0) {
    throw new Error("Cannot create a ledger entry without an amount");
  }
  const id = randomUUID();
  getDb()
    .prepare(INSERT_SQL)
    .run(
      id,
      userId,
      draft.kind,
      draftTotal(draft),
      draft.amounts[0].currency,
      draft.category,
      draft.description,
      draft.counterparty ?? null,
      draft.occurredOn,
      draft.confidence,
      draft.source,
      draft.rawText,
      now.toISOString(),
    );
  return id;
}

/** Commit several drafts atomically. Returns the entry ids in order. */
export function createEntries(userId: string, drafts: TransactionDraft[], now: Date = new Date()): string[] {
  const run = getDb().transaction(() => drafts.map((draft) => createEntry(userId, draft, now)));
  return run();
}

export function getEntry(id: string): LedgerEntry | null {
  const row = getDb().prepare<[string], LedgerRow>("SELECT * FROM ledger_entries WHERE id = ?").get(id);
  return row ? rowToEntry(row) : null;
}

/** Soft-delete the most recently committed entry. Returns it, or null when there is none. */
export function softDeleteLast(userId: string, now: Date = new Date()): LedgerEntry | null {
  const db = getDb();
  const row = db
    .prepare<[string], LedgerRow>(
      "SELECT * FROM ledger_entries WHERE user_id = ? AND is_deleted = 0 ORDER BY created_at DESC, rowid DESC LIMIT 1",
    )
    .get(userId);
  if (!row) return null;

  db.prepare("UPDATE ledger_entries SET is_deleted = 1, deleted_at = ? WHERE id = ?").run(now.toISOString(), row.id);
  return rowToEntry({ ...row, is_deleted: 1, deleted_at: now.toISOString() });
}

/** Soft-delete every live entry of a user. Returns how many were deleted. */
export function clearAll(userId: string, now: Date = new Date()): number {
  const result = getDb()
    .prepare("UPDATE ledger_entries SET is_deleted = 1, deleted_at = ? WHERE user_id = ? AND is_deleted = 0")
    .run(now.toISOString(), userId);
  return result.changes;
}

export interface ListEntriesOptions {
  limit?: number;
  /** YYYY-MM */
  month?: string;
  includeDeleted?: boolean;
}

/** Entries newest first (by occurrence date, then commit order). */
export function listEntries(userId: string, opts: ListEntriesOptions = {}): LedgerEntry[] {
  const conditions = ["user_id = ?"];
  const params: (string | number)[] = [userId];

  if (!opts.includeDeleted) conditions.push("is_deleted = 0");
  if (opts.month) {
    conditions.push("substr(occurred_on, 1, 7) = ?");
    params.push(opts.month);
  }

  let sql = `SELECT * FROM ledger_entries WHERE ${conditions.join(" AND ")} ORDER BY occurred_on DESC, rowid DESC`;
  if (opts.limit) {
    sql += " LIMIT ?";
    params.push(opts.limit);
  }
  return getDb().prepare<(string | number)[], LedgerRow>(sql).all(...params).map(rowToEntry);
}

export function countEntries(userId: string): number {
  const row = getDb()
    .prepare<[string], { count: number }>(
      "SELECT COUNT(*) AS count FROM ledger_entries WHERE user_id = ? AND is_deleted = 0",
    )
    .get(userId);
  return row?.count ?? 0;
}

export interface KindTotal {
  kind: TransactionKind;
  currency: string;
  total: number;
  count: number;
}

export interface CategoryTotal {
  category: string;
  currency: string;
  total: number;
  count: number;
}

export interface MonthlySummary {
  month: string;
  count: number;
  byKind: KindTotal[];
  /** Expense totals per category, largest first */
  byCategory: CategoryTotal[];
}

/** Totals of a user's live entries for one month (YYYY-MM). */
export function getMonthlySummary(userId: string, month: string): MonthlySummary {
  const db = getDb();
  const where = "user_id = ? AND is_deleted = 0 AND substr(occurred_on, 1, 7) = ?";

  const byKind = db
    .prepare<[string, string], KindTotal>(
      `SELECT kind, currency, ROUND(SUM(amount), 2) AS total, COUNT(*) AS count
       FROM ledger_entries WHERE ${where}
       GROUP BY kind, currency ORDER BY kind, currency`,
    )
    .all(userId, month);

  const byCategory = db
    .prepare<[string, string], CategoryTotal>(
      `SELECT category, currency, ROUND(SUM(amount), 2) AS total, COUNT(*) AS count
       FROM ledger_entries WHERE ${where} AND kind = 'expense'
       GROUP BY category, currency ORDER BY total DESC, category`,
    )
    .all(userId, month);

  const count = byKind.reduce((acc, k) => acc + k.count, 0);
  return { month, count, byKind, byCategory };
}
