/**
 * @module discord-log-sink
 * @description Discord Log Sink: a handler that posts each record to a
 * Discord channel, through a bot session or a webhook.
 *
 * > **Security Note**: the webhook URL is a credential. Keep it server-side.
 *
 * @example Webhook
 * ```ts
 * import { getLogger, DiscordLogSink } from 'discord-log-sink';
 *
 * const logger = getLogger('worker');
 * logger.addHandler(DiscordLogSink.fromWebhook(process.env.LOG_WEBHOOK_URL ?? ''));
 * logger.error('boom');
 * await logger.flush(); // rejects if the POST failed
 * ```
 *
 * @example Bot session (discord.js)
 * ```ts
 * import { DiscordLogSink, discordJsSession } from 'discord-log-sink';
 *
 * const sink = DiscordLogSink.fromBot(discordJsSession(client), '1234567890');
 * logger.addHandler(sink);
 * ```
 */

import { ChannelResolutionError, ConfigurationError } from "../core/errors.js";
import type { Handler, LevelInput, LogRecord } from "../core/types.js";
import { formatBotEmbed, formatWebhookPayload } from "./format.js";
import { immediateScheduler } from "./scheduler.js";
import type {
  BotSession,
  BotTarget,
  DiscordEmbed,
  DiscordTarget,
  DiscordTargetInput,
  Scheduler,
  Snowflake,
} from "./types.js";
import { postWebhook } from "./webhook.js";

export interface DiscordLogSinkOptions {
  /** Handler name (default: "discord") */
  name?: string;
  /** Handler level filter (default: every record the logger passes) */
  level?: LevelInput;
  /** Where bot-mode sends are queued (default: `immediateScheduler()`) */
  scheduler?: Scheduler;
  /** Fetch implementation for webhook mode (default: global `fetch`) */
  fetch?: typeof fetch;
  /** User-Agent for webhook requests */
  userAgent?: string;
}

/**
 * Validate raw target settings into a `DiscordTarget`.
 * Throws `ConfigurationError` for both, neither, or a bot without a channel.
 */
export function resolveTarget(input: DiscordTargetInput): DiscordTarget {
  const { bot, channelId, webhookUrl } = input;

  if (!bot && !webhookUrl) {
    throw new ConfigurationError("Either bot or webhookUrl must be provided.");
  }
  if (bot && webhookUrl) {
    throw new ConfigurationError("Cannot provide both bot and webhookUrl.");
  }
  if (bot) {
    return { kind: "bot", session: bot, channelId: normalizeChannelId(channelId) };
  }
  return { kind: "webhook", url: String(webhookUrl) };
}

function normalizeChannelId(channelId: Snowflake | null | undefined): string {
  if (channelId === null || channelId === undefined || channelId === "") {
    throw new ConfigurationError("A channelId is required when using a bot.");
  }
  if (typeof channelId === "number" && !Number.isSafeInteger(channelId)) {
    throw new ConfigurationError(
      `channelId ${channelId} is not an exact integer; pass it as a string.`,
    );
  }
  return String(channelId);
}

async function sendToChannel(
  target: BotTarget,
  embed: DiscordEmbed,
): Promise<void> {
  const channel = await target.session.resolveChannel(target.channelId);
  if (!channel) throw new ChannelResolutionError(target.channelId);
  await channel.send({ embeds: [embed] });
}

export class DiscordLogSink implements Handler {
  readonly name: string;
  level?: LevelInput;
  readonly target: DiscordTarget;
  private readonly _scheduler: Scheduler;
  private readonly _fetch?: typeof fetch;
  private readonly _userAgent?: string;

  static fromBot(
    bot: BotSession,
    channelId: Snowflake,
    options?: DiscordLogSinkOptions,
  ): DiscordLogSink {
    return new DiscordLogSink({ bot, channelId }, options);
  }

  static fromWebhook(
    webhookUrl: string,
    options?: DiscordLogSinkOptions,
  ): DiscordLogSink {
    return new DiscordLogSink({ webhookUrl }, options);
  }

  constructor(input: DiscordTargetInput, options: DiscordLogSinkOptions = {}) {
    this.target = resolveTarget(input);
    this.name = options.name ?? "discord";
    this.level = options.level;
    this._scheduler = options.scheduler ?? immediateScheduler();
    this._fetch = options.fetch;
    this._userAgent = options.userAgent;
  }

  /**
   * Bot mode queues the send on the scheduler and returns at once.
   * Webhook mode returns the pending POST.
   */
  emit(record: LogRecord): void | Promise<void> {
    const target = this.target;

    switch (target.kind) {
      case "bot": {
        const embed = formatBotEmbed(record);
        this._scheduler.schedule(() => sendToChannel(target, embed));
        return;
      }
      case "webhook":
        return postWebhook(target.url, formatWebhookPayload(record), {
          fetch: this._fetch,
          userAgent: this._userAgent,
        });
    }
  }
}
