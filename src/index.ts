#!/usr/bin/env node

import { runMigrations } from "./db/migrate";
import { isLedgerError } from "./errors";
import { registerCommand, routeCommand } from "./cli/router";
import { chatCommand } from "./cli/commands/chat";
import { listCommand } from "./cli/commands/list";
import { summaryCommand } from "./cli/commands/summary";
import { schedulerCommand } from "./cli/commands/scheduler";

registerCommand("chat", chatCommand);
registerCommand("list", listCommand);
registerCommand("summary", summaryCommand);
registerCommand("scheduler", schedulerCommand);

async function main(): Promise<void> {
  runMigrations();
  await routeCommand(process.argv.slice(2));
}

main().catch((err: unknown) => {
  if (isLedgerError(err)) {
    console.error(`Error [${err.code}]:`, err.message);
  } else {
    console.error("Error:", err instanceof Error ? err.message : err);
  }
  process.exitCode = 1;
});
