/**
 * @module discord-log-sink
 * @description Pipeline: filter composition and handler fan-out.
 */

import { resolveLevel, shouldLog } from "./levels.js";
import type { Handler, LogFilter, LogRecord } from "./types.js";

/**
 * Build a single predicate from an array of filters.
 * A record passes only if every filter returns true.
 */
export function composeFilters<TMeta = Record<string, unknown>>(
  filters: LogFilter<TMeta>[],
): LogFilter<TMeta> {
  if (filters.length === 0) return () => true;
  return (record) => filters.every((f) => f(record));
}

/**
 * Fan out a record to all handlers, respecting per-handler level filters.
 *
 * Synchronous handler errors propagate to the caller. Handlers returning a
 * promise are handed to `track` and never awaited here.
 */
export function dispatchToHandlers<TMeta = Record<string, unknown>>(
  record: LogRecord<TMeta>,
  handlers: readonly Handler<TMeta>[],
  track: (delivery: Promise<void>, handler: Handler<TMeta>) => void,
): void {
  for (const h of handlers) {
    const hLevel = h.level !== undefined ? resolveLevel(h.level) : 0;

    if (!shouldLog(record.level, hLevel)) continue;

    const result = h.emit(record);
    if (result instanceof Promise) {
      track(result, h);
    }
  }
}
