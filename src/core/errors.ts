/**
 * @module discord-log-sink
 * @description Error types raised by sinks and the registration API.
 */

/** Thrown when a sink is given both or neither of a bot session and a webhook URL. */
export class ConfigurationError extends Error {
  readonly code = "ERR_SINK_CONFIG";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A webhook endpoint answered with a non-2xx status. */
export class WebhookDeliveryError extends Error {
  readonly code = "ERR_WEBHOOK_DELIVERY";

  constructor(
    readonly status: number,
    readonly statusText: string,
  ) {
    super(`Webhook responded with ${status}${statusText ? ` ${statusText}` : ""}`);
    this.name = "WebhookDeliveryError";
  }
}

/** A bot session could not resolve the configured channel to one it can post in. */
export class ChannelResolutionError extends Error {
  readonly code = "ERR_CHANNEL_UNRESOLVED";

  constructor(readonly channelId: string) {
    super(`Discord channel ${channelId} could not be resolved`);
    this.name = "ChannelResolutionError";
  }
}
