/**
 * @module discord-log-sink
 * @description File handler: appends formatted lines to a file.
 * @server-only
 */

import fs from "node:fs";
import path from "node:path";
import type { Handler, LevelInput, LogRecord } from "../core/types.js";
import { type LineFormatter, lineFormatter } from "./format.js";

export interface FileHandlerOptions {
  /** File to append to. Its directory is created if missing. */
  filename: string;
  /** Per-handler level filter */
  level?: LevelInput;
  /** Turns a record into a line. Default: `lineFormatter()` */
  formatter?: LineFormatter;
}

export function fileHandler(options: FileHandlerOptions): Handler {
  const { filename, level } = options;
  const formatter = options.formatter ?? lineFormatter();

  const dir = path.dirname(filename);
  if (dir !== ".") {
    fs.mkdirSync(dir, { recursive: true });
  }

  const stream = fs.createWriteStream(filename, { flags: "a" });
  stream.on("error", (err) => {
    console.error(`[discord-log-sink] File write error to ${filename}:`, err);
  });

  return {
    name: "file",
    level,
    emit(record: LogRecord): void {
      if (!stream.writableEnded) {
        stream.write(`${formatter(record)}\n`);
      }
    },
    async close(): Promise<void> {
      if (stream.writableEnded) return;
      return new Promise((resolve) => {
        stream.end(() => resolve());
      });
    },
  };
}
