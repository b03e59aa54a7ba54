/**
 * `chat-ledger list` command.
 * Lists a user's ledger entries, newest first.
 */

import { listEntries, type ListEntriesOptions } from "../../db/ledger";
import { formatMoney, kindLabel } from "../../format";
import type { LedgerEntry } from "../../types";
import { DEFAULT_USER } from "./chat";

export interface ListArgs extends ListEntriesOptions {
  userId: string;
}

/** Parse CLI args into filter options. */
export function parseListArgs(args: string[]): ListArgs {
  const opts: ListArgs = { userId: DEFAULT_USER, limit: 20 };

  for (const arg of args) {
    if (arg.startsWith("--user=")) {
      opts.userId = arg.slice("--user=".length) || DEFAULT_USER;
    } else if (arg.startsWith("--month=")) {
      opts.month = arg.slice("--month=".length);
    } else if (arg.startsWith("--limit=")) {
      const limit = Number.parseInt(arg.slice("--limit=".length), 10);
      if (limit > 0) opts.limit = limit;
    } else if (arg === "--all") {
      opts.includeDeleted = true;
    }
  }

  return opts;
}

/** Format an entry as a single display line. */
export function formatEntry(entry: LedgerEntry): string {
  const sign = entry.kind === "income" ? "+" : "-";
  const amount = `${sign}${formatMoney(entry.amount, entry.currency)}`;
  const deleted = entry.isDeleted ? " [borrado]" : "";
  return `${entry.occurredOn}  ${amount.padEnd(15)} ${kindLabel(entry.kind).padEnd(14)} ${entry.category.padEnd(15)} ${entry.description || "-"}${deleted}`;
}

function formatHeader(): string {
  return `${"Fecha".padEnd(10)}  ${"Monto".padEnd(15)} ${"Tipo".padEnd(14)} ${"Categoría".padEnd(15)} Descripción`;
}

/** Dependencies injectable for testing. */
export interface ListDeps {
  listEntries: typeof listEntries;
}

const defaultDeps: ListDeps = {
  listEntries,
};

export async function listCommand(args: string[], deps: ListDeps = defaultDeps): Promise<void> {
  const { userId, ...opts } = parseListArgs(args);
  const entries = deps.listEntries(userId, opts);

  if (entries.length === 0) {
    console.log("No entries found.");
    return;
  }

  console.log(formatHeader());
  console.log("-".repeat(80));
  for (const entry of entries) {
    console.log(formatEntry(entry));
  }
  console.log("-".repeat(80));
  console.log(`${entries.length} entr${entries.length === 1 ? "y" : "ies"}`);
}
