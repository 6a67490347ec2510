/**
 * @module discord-log-sink
 * @description Bot session backed by a discord.js `Client`.
 */

import type { Client } from "discord.js";
import type { BotSession } from "./types.js";

/**
 * Resolves channels from the client's cache, falling back to the API.
 * Channels that are not text-based, or that cannot be posted to, resolve
 * to `null`.
 */
export function discordJsSession(client: Client): BotSession {
  return {
    async resolveChannel(channelId) {
      const channel =
        client.channels.cache.get(channelId) ??
        (await client.channels.fetch(channelId));
      if (!channel || !channel.isTextBased() || !("send" in channel)) {
        return null;
      }
      return { send: (message) => channel.send(message) };
    },
  };
}
