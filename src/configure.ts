/**
 * @module discord-log-sink
 * @description One-call setup for named loggers.
 *
 * @example Bot
 * ```ts
 * const logger = configureDiscordLogging('bot', {
 *   bot: discordJsSession(client),
 *   channelId: '1234567890',
 * });
 * logger.info('Ready');
 * ```
 *
 * @example Webhook
 * ```ts
 * const logger = configureDiscordLogging('jobs', { webhookUrl });
 * ```
 */

import { getLogger } from "./core/logger.js";
import { LogLevel, type Logger } from "./core/types.js";
import { DiscordLogSink, type DiscordLogSinkOptions } from "./discord/sink.js";
import type { DiscordTargetInput } from "./discord/types.js";
import { consoleHandler } from "./handlers/console.js";
import { fileHandler } from "./handlers/file.js";
import { lineFormatter } from "./handlers/format.js";

/**
 * Fetch the logger named `name`, open it to every severity and attach a
 * `DiscordLogSink` that only takes INFO and above.
 *
 * The target is validated before the logger is touched: a bad target throws
 * `ConfigurationError` and leaves the registry unchanged.
 */
export function configureDiscordLogging(
  name: string,
  target: DiscordTargetInput,
  options: Omit<DiscordLogSinkOptions, "level"> = {},
): Logger {
  const sink = new DiscordLogSink(target, { ...options, level: LogLevel.INFO });

  const logger = getLogger(name);
  logger.setLevel(LogLevel.DEBUG);
  logger.addHandler(sink);
  return logger;
}

/**
 * Fetch the logger named `name` and attach a file handler and a console
 * handler, both at INFO, writing
 * `[LEVEL] [module]: YYYY-MM-DD HH:MM:SS - message` lines.
 */
export function configureLogging(name: string, filename: string): Logger {
  const formatter = lineFormatter();

  const logger = getLogger(name);
  logger.setLevel(LogLevel.DEBUG);
  logger.addHandler(fileHandler({ filename, level: LogLevel.INFO, formatter }));
  logger.addHandler(consoleHandler({ level: LogLevel.INFO, formatter }));
  return logger;
}
