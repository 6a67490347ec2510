/**
 * @module discord-log-sink
 * @description Core Logger class and the named logger registry.
 *
 * @example Basic usage
 * ```ts
 * import { getLogger, consoleHandler } from 'discord-log-sink';
 *
 * const logger = getLogger('app.worker');
 * logger.setLevel('DEBUG');
 * logger.addHandler(consoleHandler({ level: 'INFO' }));
 *
 * logger.info('Worker started', { queue: 'emails' });
 * ```
 *
 * @example Error with stack trace
 * ```ts
 * logger.error('Connection failed', new Error('ETIMEDOUT'));
 * logger.error('Handler crashed', { job: 42 }, new Error('null ref'));
 * ```
 */

import { levelName, resolveLevel, shouldLog } from "./levels.js";
import { composeFilters, dispatchToHandlers } from "./pipeline.js";
import {
  type Handler,
  type HandlerErrorHook,
  type LevelInput,
  type LogError,
  type LogFilter,
  type Logger,
  type LoggerOptions,
  LogLevel,
  type LogRecord,
} from "./types.js";

// ─── Logger Implementation ──────────────────────────────────────

class LoggerImpl<TMeta = Record<string, unknown>> implements Logger<TMeta> {
  readonly name: string;
  private _level: number;
  private _handlers: Handler<TMeta>[];
  private _filterList: LogFilter<TMeta>[];
  private _filter: LogFilter<TMeta>;
  private _module: string;
  private _timestampFn: () => number;
  private _onError?: HandlerErrorHook<TMeta>;
  private _pending = new Set<Promise<void>>();
  /** First delivery failure since the last flush; later ones only reach `onError` */
  private _failure: { error: unknown } | null = null;
  private _dispatching = false;

  constructor(options: LoggerOptions<TMeta> = {}) {
    this.name = options.name ?? "root";
    this._level = resolveLevel(options.level ?? "WARNING");
    this._handlers = [...(options.handlers ?? [])];
    this._filterList = [...(options.filters ?? [])];
    this._filter = composeFilters(this._filterList);
    this._module = options.module ?? moduleFromName(this.name);
    this._timestampFn = options.timestamp ?? (() => Date.now());
    this._onError = options.onError;
  }

  // ─── Log Methods ────────────────────────────────────────────

  debug(message: string, meta?: Partial<TMeta>): void {
    this._log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: Partial<TMeta>): void {
    this._log(LogLevel.INFO, message, meta);
  }

  warning(message: string, meta?: Partial<TMeta>): void {
    this._log(LogLevel.WARNING, message, meta);
  }

  warn(message: string, meta?: Partial<TMeta>): void {
    this._log(LogLevel.WARNING, message, meta);
  }

  error(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void {
    this.log(LogLevel.ERROR, message, metaOrError, error);
  }

  critical(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void {
    this.log(LogLevel.CRITICAL, message, metaOrError, error);
  }

  log(
    level: LevelInput,
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void {
    if (metaOrError instanceof Error) {
      this._log(resolveLevel(level), message, undefined, metaOrError);
    } else {
      this._log(resolveLevel(level), message, metaOrError, error);
    }
  }

  // ─── Handlers & Filters ────────────────────────────────────

  addHandler(handler: Handler<TMeta>): void {
    if (!this._handlers.includes(handler)) this._handlers.push(handler);
  }

  removeHandler(handler: Handler<TMeta> | string): void {
    this._handlers = this._handlers.filter((h) =>
      typeof handler === "string" ? h.name !== handler : h !== handler,
    );
  }

  hasHandler(handler: Handler<TMeta> | string): boolean {
    return this._handlers.some((h) =>
      typeof handler === "string" ? h.name === handler : h === handler,
    );
  }

  getHandlers(): readonly Handler<TMeta>[] {
    return [...this._handlers];
  }

  addFilter(filter: LogFilter<TMeta>): void {
    this._filterList.push(filter);
    this._filter = composeFilters(this._filterList);
  }

  removeFilter(filter: LogFilter<TMeta>): void {
    this._filterList = this._filterList.filter((f) => f !== filter);
    this._filter = composeFilters(this._filterList);
  }

  // ─── Level Control ─────────────────────────────────────────

  setLevel(level: LevelInput): void {
    this._level = resolveLevel(level);
  }

  getLevel(): number {
    return this._level;
  }

  isLevelEnabled(level: LevelInput): boolean {
    return shouldLog(resolveLevel(level), this._level);
  }

  // ─── Lifecycle ──────────────────────────────────────────────

  async flush(): Promise<void> {
    await Promise.all([...this._pending]);
    await Promise.all(this._handlers.map((h) => h.flush?.()));
    const failure = this._failure;
    this._failure = null;
    if (failure) throw failure.error;
  }

  async close(): Promise<void> {
    try {
      await this.flush();
    } finally {
      await Promise.all(this._handlers.map((h) => h.close?.()));
    }
  }

  // ─── Internal ───────────────────────────────────────────────

  private _log(
    level: number,
    message: string,
    meta?: Partial<TMeta>,
    error?: Error,
  ): void {
    if (!shouldLog(level, this._level)) return;
    // Records raised from inside a handler or the error hook never re-enter.
    if (this._dispatching) return;

    const created = this._timestampFn();
    const metaModule: unknown =
      meta && typeof meta === "object" && "module" in meta
        ? meta.module
        : undefined;

    const record: LogRecord<TMeta> = {
      name: this.name,
      level,
      levelName: levelName(level),
      message,
      module: typeof metaModule === "string" ? metaModule : this._module,
      created,
      asctime: formatAsctime(created),
      meta: (meta ?? {}) as TMeta,
      error: error ? serializeError(error) : undefined,
    };

    if (!this._filter(record)) return;

    this._dispatching = true;
    try {
      dispatchToHandlers(record, this._handlers, (delivery, handler) =>
        this._track(delivery, record, handler),
      );
    } finally {
      this._dispatching = false;
    }
  }

  private _track(
    delivery: Promise<void>,
    record: LogRecord<TMeta>,
    handler: Handler<TMeta>,
  ): void {
    const settled: Promise<void> = delivery
      .then(
        () => undefined,
        (err: unknown) => {
          this._failure ??= { error: err };
          this._reportError(err, record, handler.name);
        },
      )
      .finally(() => {
        this._pending.delete(settled);
      });
    this._pending.add(settled);
  }

  private _reportError(
    error: unknown,
    record: LogRecord<TMeta>,
    handlerName: string,
  ): void {
    if (!this._onError) return;
    this._dispatching = true;
    try {
      this._onError(error, record, handlerName);
    } finally {
      this._dispatching = false;
    }
  }
}

// ─── Record Helpers ──────────────────────────────────────────────

/** `YYYY-MM-DD HH:MM:SS,mmm` in UTC */
export function formatAsctime(epochMs: number): string {
  const iso = new Date(epochMs).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)},${iso.slice(20, 23)}`;
}

function moduleFromName(name: string): string {
  const segments = name.split(".");
  return segments[segments.length - 1] || name;
}

/** Recursively serialize an Error including the ES2022 cause chain */
function serializeError(error: Error, depth = 0): LogError {
  const logError: LogError = {
    message: error.message,
    name: error.name,
    code: (error as NodeJS.ErrnoException).code,
    stack: error.stack,
  };
  // Cap depth at 5 to stop cyclic causes
  if (error.cause instanceof Error && depth < 5) {
    logError.cause = serializeError(error.cause, depth + 1);
  }
  return logError;
}

// ─── Registry ────────────────────────────────────────────────────

const registry = new Map<string, Logger>();

/**
 * Return the logger registered under `name`, creating it on first use.
 * The same name always yields the same instance.
 *
 * @example
 * ```ts
 * const a = getLogger('billing');
 * const b = getLogger('billing');
 * a === b; // true
 * ```
 */
export function getLogger(name = "root"): Logger {
  let logger = registry.get(name);
  if (!logger) {
    logger = new LoggerImpl({ name });
    registry.set(name, logger);
  }
  return logger;
}

/**
 * Create a standalone logger that is not registered by name.
 *
 * @example Full options
 * ```ts
 * const logger = createLogger({
 *   name: 'jobs',
 *   level: 'DEBUG',
 *   handlers: [consoleHandler()],
 *   onError: (err, record) => process.stderr.write(`${record.message}: ${err}\n`),
 * });
 * ```
 */
export function createLogger<TMeta = Record<string, unknown>>(
  options?: LoggerOptions<TMeta>,
): Logger<TMeta> {
  return new LoggerImpl<TMeta>(options);
}
