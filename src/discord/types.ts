/**
 * @module discord-log-sink
 * @description Discord message shapes and the capabilities a sink is given.
 */

// ─── Rendered Message ────────────────────────────────────────────

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

/** Subset of Discord's embed object produced for a log record */
export interface DiscordEmbed {
  description: string;
  color: number;
  /** ISO-8601 instant */
  timestamp: string;
  fields: EmbedField[];
}

/** JSON body POSTed to a webhook */
export interface WebhookPayload {
  embeds: DiscordEmbed[];
}

/** Message handed to a bot channel's `send` */
export interface ChannelMessage {
  embeds: DiscordEmbed[];
}

// ─── Bot Capabilities ────────────────────────────────────────────

/** Discord ids are 64-bit snowflakes; numbers are accepted while they stay exact. */
export type Snowflake = string | bigint | number;

export interface SendableChannel {
  send(message: ChannelMessage): Promise<unknown>;
}

/**
 * A host-managed bot connection. Returns `null`/`undefined` when the id does
 * not name a channel the bot can post in.
 */
export interface BotSession {
  resolveChannel(
    channelId: string,
  ):
    | SendableChannel
    | null
    | undefined
    | Promise<SendableChannel | null | undefined>;
}

export type ScheduledTask = () => Promise<void>;

/**
 * Host-owned cooperative scheduler. `schedule` must return without running
 * the task to completion; failures are the scheduler's to report.
 */
export interface Scheduler {
  schedule(task: ScheduledTask): void;
}

// ─── Targets ─────────────────────────────────────────────────────

export interface BotTarget {
  readonly kind: "bot";
  readonly session: BotSession;
  readonly channelId: string;
}

export interface WebhookTarget {
  readonly kind: "webhook";
  readonly url: string;
}

/** Where a sink delivers: exactly one of a bot channel or a webhook */
export type DiscordTarget = BotTarget | WebhookTarget;

/**
 * Unvalidated target settings, as accepted by the sink constructor and the
 * registration API. Exactly one of `bot` or `webhookUrl` must be set.
 */
export interface DiscordTargetInput {
  /** Bot session used to resolve and post to `channelId` */
  bot?: BotSession | null;
  /** Channel the bot posts into */
  channelId?: Snowflake | null;
  /** Webhook endpoint URL */
  webhookUrl?: string | null;
}
