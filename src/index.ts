/**
 * @module discord-log-sink
 *
 * Forwards log records to a Discord channel, through a bot session or a webhook.
 */

// ─── Level Utilities ─────────────────────────────────────────────
export { levelName, resolveLevel, shouldLog } from "./core/levels.js";
// ─── Core ────────────────────────────────────────────────────────
export { createLogger, formatAsctime, getLogger } from "./core/logger.js";
export {
  ChannelResolutionError,
  ConfigurationError,
  WebhookDeliveryError,
} from "./core/errors.js";
// ─── Types ───────────────────────────────────────────────────────
export {
  type Handler,
  type HandlerErrorHook,
  type LevelInput,
  type LogError,
  type LogFilter,
  type Logger,
  type LoggerOptions,
  LogLevel,
  type LogLevelName,
  LogLevelNameMap,
  type LogLevelValue,
  LogLevelValueMap,
  type LogRecord,
} from "./core/types.js";
// ─── Discord ─────────────────────────────────────────────────────
export {
  DiscordLogSink,
  type DiscordLogSinkOptions,
  resolveTarget,
} from "./discord/sink.js";
export {
  EmbedColor,
  formatBotEmbed,
  formatWebhookPayload,
  getColor,
  getTimestamp,
  MAX_DESCRIPTION_LENGTH,
  toIsoTimestamp,
} from "./discord/format.js";
export {
  immediateScheduler,
  reportToConsole,
  type TaskErrorReporter,
} from "./discord/scheduler.js";
export {
  DEFAULT_USER_AGENT,
  type PostWebhookOptions,
  postWebhook,
} from "./discord/webhook.js";
export { discordJsSession } from "./discord/discordjs.js";
export type {
  BotSession,
  BotTarget,
  ChannelMessage,
  DiscordEmbed,
  DiscordTarget,
  DiscordTargetInput,
  EmbedField,
  ScheduledTask,
  Scheduler,
  SendableChannel,
  Snowflake,
  WebhookPayload,
  WebhookTarget,
} from "./discord/types.js";
// ─── Handlers ────────────────────────────────────────────────────
export {
  type ConsoleHandlerOptions,
  consoleHandler,
} from "./handlers/console.js";
export { type FileHandlerOptions, fileHandler } from "./handlers/file.js";
export {
  DEFAULT_LINE_FORMAT,
  type LineFormatter,
  type LineFormatterOptions,
  lineFormatter,
} from "./handlers/format.js";
// ─── Setup ───────────────────────────────────────────────────────
export { configureDiscordLogging, configureLogging } from "./configure.js";
