/**
 * `chat-ledger scheduler` command.
 * Runs one generate-and-dispatch cycle, or keeps running with --watch.
 * Reminders go to stdout through the console messenger.
 */

import { getConfig } from "../../config";
import { runSchedulerTick, startScheduler, type TickResult } from "../../scheduler/runner";
import type { Messenger, SendResult } from "../../types";

export interface SchedulerArgs {
  watch: boolean;
  /** Instant to run the cycle as of, for backfills and testing */
  at?: Date;
  intervalMs?: number;
}

export function parseSchedulerArgs(args: string[]): SchedulerArgs {
  const opts: SchedulerArgs = { watch: false };
  for (const arg of args) {
    if (arg === "--watch") {
      opts.watch = true;
    } else if (arg.startsWith("--at=")) {
      const at = new Date(arg.slice("--at=".length));
      if (!Number.isNaN(at.getTime())) opts.at = at;
    } else if (arg.startsWith("--interval=")) {
      const seconds = Number.parseInt(arg.slice("--interval=".length), 10);
      if (seconds > 0) opts.intervalMs = seconds * 1000;
    }
  }
  return opts;
}

/** Messenger that prints each message, for running without a chat platform. */
export function createConsoleMessenger(writeLine: (text: string) => void = console.log): Messenger {
  return {
    async sendMessage(userId: string, text: string): Promise<SendResult> {
      writeLine(`[${userId}] ${text}`);
      return { ok: true };
    },
  };
}

export function formatTick(result: TickResult): string {
  const failed = result.dispatched.filter((d) => !d.ok).length;
  const sent = result.dispatched.length - failed;
  return `Scheduler: ${result.created.length} bill(s) created, ${sent} reminder(s) sent, ${failed} failed`;
}

export interface SchedulerDeps {
  messenger: Messenger;
  runSchedulerTick: typeof runSchedulerTick;
  startScheduler: typeof startScheduler;
}

function createDefaultDeps(): SchedulerDeps {
  return { messenger: createConsoleMessenger(), runSchedulerTick, startScheduler };
}

export async function schedulerCommand(args: string[], deps: SchedulerDeps = createDefaultDeps()): Promise<void> {
  const opts = parseSchedulerArgs(args);

  if (!opts.watch) {
    const result = await deps.runSchedulerTick(deps.messenger, opts.at ?? new Date());
    console.log(formatTick(result));
    if (result.dispatched.some((d) => !d.ok)) process.exitCode = 1;
    return;
  }

  const intervalMs = opts.intervalMs ?? getConfig().scheduler.intervalMs;
  console.log(`Scheduler: running every ${Math.round(intervalMs / 1000)}s (Ctrl+C to stop)`);
  const stop = deps.startScheduler({
    messenger: deps.messenger,
    intervalMs,
    onTick: (result) => console.log(formatTick(result)),
  });
  process.once("SIGINT", () => {
    stop();
    console.log("Scheduler: stopped");
  });
}
