/**
 * @module discord-log-sink
 * @description Console handler: writes formatted lines to `console.info`, `console.error`, etc.
 *
 * @example
 * ```ts
 * import { getLogger, consoleHandler } from 'discord-log-sink';
 *
 * getLogger('app').addHandler(consoleHandler({ level: 'INFO' }));
 * ```
 */

import {
  type Handler,
  type LevelInput,
  LogLevel,
  type LogRecord,
} from "../core/types.js";
import { type LineFormatter, lineFormatter } from "./format.js";

export interface ConsoleHandlerOptions {
  /** Per-handler level filter */
  level?: LevelInput;
  /**
   * Use the console method matching the level (console.warn, console.error, etc.).
   * Default: true
   */
  useConsoleLevels?: boolean;
  /** Turns a record into a line. Default: `lineFormatter()` */
  formatter?: LineFormatter;
}

export function consoleHandler(options: ConsoleHandlerOptions = {}): Handler {
  const useConsoleLevels = options.useConsoleLevels ?? true;
  const formatter = options.formatter ?? lineFormatter();

  return {
    name: "console",
    level: options.level,
    emit(record: LogRecord): void {
      const output = formatter(record);

      if (!useConsoleLevels) {
        console.log(output);
        return;
      }

      if (record.level >= LogLevel.ERROR) {
        console.error(output);
      } else if (record.level >= LogLevel.WARNING) {
        console.warn(output);
      } else if (record.level >= LogLevel.INFO) {
        console.info(output);
      } else {
        console.debug(output);
      }
    },
  };
}
