/**
 * @module discord-log-sink
 * @description Type definitions for the named logger and its handlers.
 */

// ─── Log Levels ──────────────────────────────────────────────────

export const LogLevel = {
  NOTSET: 0,
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
} as const;

export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

type LevelNameInput = LogLevelName | "WARN" | "FATAL";

/** Level names (either case) or numbers, accepted wherever a level is configured */
export type LevelInput = LevelNameInput | Lowercase<LevelNameInput> | number;

/** Map from level name (lowercase, aliases included) to numeric value */
export const LogLevelNameMap: Record<string, number> = {
  ...Object.fromEntries(
    Object.entries(LogLevel).map(([k, v]) => [k.toLowerCase(), v]),
  ),
  warn: LogLevel.WARNING,
  fatal: LogLevel.CRITICAL,
};

/** Map from numeric value to level name */
export const LogLevelValueMap: Record<number, LogLevelName> = {
  0: "NOTSET",
  10: "DEBUG",
  20: "INFO",
  30: "WARNING",
  40: "ERROR",
  50: "CRITICAL",
};

// ─── Log Record ──────────────────────────────────────────────────

export interface LogRecord<TMeta = Record<string, unknown>> {
  /** Name of the logger that produced the record */
  readonly name: string;
  /** Numeric log level */
  readonly level: number;
  /** Level name, `Level <n>` for custom levels */
  readonly levelName: string;
  /** Log message */
  readonly message: string;
  /** Originating module name */
  readonly module: string;
  /** Unix epoch timestamp (ms) */
  readonly created: number;
  /** Formatted creation time, `YYYY-MM-DD HH:MM:SS,mmm` (UTC) */
  readonly asctime: string;
  /** User-defined structured metadata */
  readonly meta: Readonly<TMeta>;
  /** Error information */
  readonly error?: LogError;
}

export interface LogError {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
  /** Nested cause chain (ES2022 Error.cause support) */
  cause?: LogError;
}

// ─── Handler ─────────────────────────────────────────────────────

/**
 * A Handler receives log records and delivers them to a destination
 * (console, file, Discord channel, etc.).
 *
 * `emit()` may return a Promise; the logger tracks it until it settles.
 */
export interface Handler<TMeta = Record<string, unknown>> {
  /** Unique name for this handler */
  readonly name: string;
  /** Per-handler level filter (default: every record the logger passes) */
  level?: LevelInput;
  /** Deliver a record */
  emit(record: LogRecord<TMeta>): void | Promise<void>;
  /** Flush any buffered output */
  flush?(): void | Promise<void>;
  /** Graceful shutdown */
  close?(): void | Promise<void>;
}

/** Returns `false` to drop the record before any handler sees it */
export type LogFilter<TMeta = Record<string, unknown>> = (
  record: LogRecord<TMeta>,
) => boolean;

/** Observes a failed asynchronous delivery */
export type HandlerErrorHook<TMeta = Record<string, unknown>> = (
  error: unknown,
  record: LogRecord<TMeta>,
  handlerName: string,
) => void;

// ─── Logger Options ──────────────────────────────────────────────

export interface LoggerOptions<TMeta = Record<string, unknown>> {
  /** Logger name (default: "root") */
  name?: string;
  /** Minimum log level (default: WARNING) */
  level?: LevelInput;
  /** Handlers for log output */
  handlers?: Handler<TMeta>[];
  /** Record filters */
  filters?: LogFilter<TMeta>[];
  /** Module name stamped on records that carry no `meta.module` */
  module?: string;
  /** Custom timestamp function (default: Date.now) */
  timestamp?: () => number;
  /** Called for every rejected handler delivery */
  onError?: HandlerErrorHook<TMeta>;
}

// ─── Logger Interface ────────────────────────────────────────────

export interface Logger<TMeta = Record<string, unknown>> {
  readonly name: string;

  debug(message: string, meta?: Partial<TMeta>): void;
  info(message: string, meta?: Partial<TMeta>): void;
  warning(message: string, meta?: Partial<TMeta>): void;
  /** Alias of `warning` */
  warn(message: string, meta?: Partial<TMeta>): void;
  error(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void;
  critical(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void;
  log(
    level: LevelInput,
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void;

  /** Attach a handler; attaching the same handler twice is a no-op */
  addHandler(handler: Handler<TMeta>): void;
  /** Detach a handler by reference or by name */
  removeHandler(handler: Handler<TMeta> | string): void;
  hasHandler(handler: Handler<TMeta> | string): boolean;
  getHandlers(): readonly Handler<TMeta>[];

  addFilter(filter: LogFilter<TMeta>): void;
  removeFilter(filter: LogFilter<TMeta>): void;

  /** Change the minimum log level at runtime */
  setLevel(level: LevelInput): void;
  /** Get the current minimum log level */
  getLevel(): number;
  /** Check if a given level would reach the handlers */
  isLevelEnabled(level: LevelInput): boolean;

  /** Wait for pending deliveries; rejects with the first failure since the last flush */
  flush(): Promise<void>;
  /** Flush, then close all handlers; handlers close even when flush rejects */
  close(): Promise<void>;
}
