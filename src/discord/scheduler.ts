/**
 * @module discord-log-sink
 * @description Default scheduler for bot-mode sends.
 *
 * Bots that already own a task queue should pass their own `Scheduler`
 * to the sink instead.
 */

import type { Scheduler } from "./types.js";

export type TaskErrorReporter = (error: unknown) => void;

/** Writes to stderr directly; never goes back through a logger. */
export const reportToConsole: TaskErrorReporter = (error) => {
  console.error("[discord-log-sink] Scheduled send failed:", error);
};

/**
 * Runs each task on the next turn of the event loop (`setImmediate`).
 * Rejections go to `onError`; if `onError` itself throws, both errors go
 * to the console.
 */
export function immediateScheduler(
  onError: TaskErrorReporter = reportToConsole,
): Scheduler {
  return {
    schedule(task) {
      setImmediate(() => {
        task().catch((error: unknown) => {
          try {
            onError(error);
          } catch (reportError) {
            reportToConsole(error);
            console.error("[discord-log-sink] Error reporter failed:", reportError);
          }
        });
      });
    },
  };
}
