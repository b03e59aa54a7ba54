/**
 * `chat-ledger summary` command.
 * Monthly totals by kind and expense category.
 */

import { getMonthlySummary } from "../../db/ledger";
import { getConfig } from "../../config";
import { todayIn } from "../../calendar";
import { summaryText } from "../../conversation/replies";
import { DEFAULT_USER } from "./chat";

export interface SummaryArgs {
  userId: string;
  /** YYYY-MM */
  month?: string;
}

export function parseSummaryArgs(args: string[]): SummaryArgs {
  const opts: SummaryArgs = { userId: DEFAULT_USER };
  for (const arg of args) {
    if (arg.startsWith("--user=")) {
      opts.userId = arg.slice("--user=".length) || DEFAULT_USER;
    } else if (arg.startsWith("--month=")) {
      opts.month = arg.slice("--month=".length);
    }
  }
  return opts;
}

export interface SummaryDeps {
  getMonthlySummary: typeof getMonthlySummary;
  currentMonth: () => string;
}

const defaultDeps: SummaryDeps = {
  getMonthlySummary,
  currentMonth: () => todayIn(getConfig().timezone, new Date()).slice(0, 7),
};

export async function summaryCommand(args: string[], deps: SummaryDeps = defaultDeps): Promise<void> {
  const opts = parseSummaryArgs(args);
  const month = opts.month ?? deps.currentMonth();
  if (!/^\d{4}-\d{2}$/.test(month)) {
    console.error(`Invalid month: ${month}. Use YYYY-MM.`);
    process.exitCode = 1;
    return;
  }
  console.log(summaryText(deps.getMonthlySummary(opts.userId, month)));
}
