/**
 * @module discord-log-sink
 * @description Log level utilities: filtering, comparison, resolution.
 */

import {
  type LevelInput,
  LogLevel,
  LogLevelNameMap,
  LogLevelValueMap,
} from "./types.js";

/**
 * Resolve a level name or number to its numeric value.
 * Names are case-insensitive. Returns NOTSET if unrecognized.
 */
export function resolveLevel(level: LevelInput | string): number {
  if (typeof level === "number") return level;
  const n = LogLevelNameMap[level.toLowerCase()];
  return n !== undefined ? n : LogLevel.NOTSET;
}

/**
 * Name for a numeric level. Custom levels render as `Level <n>`.
 */
export function levelName(level: number): string {
  return LogLevelValueMap[level] ?? `Level ${level}`;
}

/**
 * Check if a record at `recordLevel` passes the `filterLevel`.
 */
export function shouldLog(recordLevel: number, filterLevel: number): boolean {
  return recordLevel >= filterLevel;
}
