import { generateDue } from "./generator";
import { dispatchDue, type DispatchedNotification } from "./dispatcher";
import { purgeExpiredPending } from "../db/pending-actions";
import type { BillInstance, Messenger } from "../types";

export interface TickResult {
  created: BillInstance[];
  dispatched: DispatchedNotification[];
  /** Expired pending actions removed */
  expiredPending: number;
}

/** One scheduler cycle: generate due instances, send due reminders, drop expired pending actions. */
export async function runSchedulerTick(messenger: Messenger, now: Date = new Date()): Promise<TickResult> {
  const created = generateDue(now);
  const dispatched = await dispatchDue(messenger, now);
  const expiredPending = purgeExpiredPending(now);
  return { created, dispatched, expiredPending };
}

export interface SchedulerOptions {
  messenger: Messenger;
  intervalMs: number;
  clock?: () => Date;
  onTick?: (result: TickResult) => void;
}

/**
 * Run a tick now and then every `intervalMs`. A tick never overlaps the previous one.
 * Returns a stop function.
 */
export function startScheduler(opts: SchedulerOptions): () => void {
  const clock = opts.clock ?? (() => new Date());
  let running = false;

  const tick = async () => {
    if (running) return;
    running = true;
    try {
      const result = await runSchedulerTick(opts.messenger, clock());
      opts.onTick?.(result);
    } catch (err) {
      console.error("Scheduler: tick failed:", err);
    } finally {
      running = false;
    }
  };

  void tick();
  const timer = setInterval(() => void tick(), opts.intervalMs);
  return () => clearInterval(timer);
}
