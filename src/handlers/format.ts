/**
 * @module discord-log-sink
 * @description Line formatter for text handlers, using `%(field)s` placeholders.
 *
 * @example
 * ```ts
 * const format = lineFormatter({ format: '%(levelname)s %(name)s: %(message)s' });
 * format(record); // → "INFO app: started"
 * ```
 */

import type { LogRecord } from "../core/types.js";

export const DEFAULT_LINE_FORMAT =
  "[%(levelname)s] [%(module)s]: %(asctime)s - %(message)s";

export type LineFormatter = (record: LogRecord) => string;

export interface LineFormatterOptions {
  /** Placeholder pattern (default: `DEFAULT_LINE_FORMAT`) */
  format?: string;
  /**
   * `asctime` precision. `seconds` renders `YYYY-MM-DD HH:MM:SS`,
   * `milliseconds` keeps the `,mmm` suffix. Default: `seconds`
   */
  datePrecision?: "seconds" | "milliseconds";
}

const PLACEHOLDER = /%\((\w+)\)s/g;

export function lineFormatter(options: LineFormatterOptions = {}): LineFormatter {
  const pattern = options.format ?? DEFAULT_LINE_FORMAT;
  const keepMillis = options.datePrecision === "milliseconds";

  return (record) => {
    const fields: Record<string, string> = {
      name: record.name,
      levelname: record.levelName,
      levelno: String(record.level),
      module: record.module,
      message: record.message,
      created: String(record.created),
      asctime: keepMillis
        ? record.asctime
        : (record.asctime.split(",")[0] ?? record.asctime),
    };

    let line = pattern.replace(PLACEHOLDER, (match, key: string) =>
      key in fields ? (fields[key] ?? match) : match,
    );

    if (record.error?.stack) {
      line += `\n${record.error.stack}`;
    }
    return line;
  };
}
