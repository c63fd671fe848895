/**
 * Suspension helpers: yield and advisory timeouts. Timeouts only set the
 * cancellation flag; the work decides when to stop.
 */

import { setImmediate } from "node:timers";
import { systemClock, type Clock } from "./scheduler.js";
import type { Task } from "./task.js";

/** Suspends until the next macrotask turn so other ready work can run. */
export function yieldNow(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

/**
 * Cancels `task` with a timeout reason if it has not settled after `ms`.
 * Returns a function that clears the timer early. The timer is cleared
 * automatically when the task settles.
 */
export function cancelAfter(task: Task<unknown>, ms: number, clock: Clock = systemClock): () => void {
  const controller = new AbortController();
  void clock.sleep(ms, controller.signal).then(
    () => {
      task.cancel({ type: "timeout", ms });
    },
    () => {
      // Cleared before the deadline
    },
  );
  void task.finished().then(() => controller.abort());
  return () => controller.abort();
}

/**
 * Awaits `task` for at most `ms`. On expiry the task is canceled (advisory)
 * and the returned promise still waits for whatever the task does with that.
 */
export async function withTimeout<T>(task: Task<T>, ms: number, clock: Clock = systemClock): Promise<T> {
  const clear = cancelAfter(task, ms, clock);
  try {
    return await task.value();
  } finally {
    clear();
  }
}
