/**
 * @module discord-log-sink
 * @description Renders log records as Discord embeds.
 */

import { LogLevel, type LogRecord } from "../core/types.js";
import type { DiscordEmbed, WebhookPayload } from "./types.js";

/** Accent colours for the embed's side bar */
export const EmbedColor = {
  RED: 0xe74c3c,
  YELLOW: 0xf1c40f,
  GREY: 0x95a5a6,
} as const;

/** Discord rejects embed descriptions longer than this */
export const MAX_DESCRIPTION_LENGTH = 4096;

type RenderableRecord = Pick<
  LogRecord,
  "level" | "levelName" | "message" | "module" | "asctime"
>;

export function getColor(level: number): number {
  if (level >= LogLevel.ERROR) return EmbedColor.RED;
  if (level === LogLevel.WARNING) return EmbedColor.YELLOW;
  return EmbedColor.GREY;
}

/**
 * Display timestamp: the record's `asctime` cut at the first comma,
 * e.g. `2024-03-01 12:00:00,123` → `2024-03-01 12:00:00`.
 */
export function getTimestamp(record: Pick<LogRecord, "asctime">): string {
  return record.asctime.split(",")[0] ?? record.asctime;
}

/** `2024-03-01 12:00:00` → `2024-03-01T12:00:00.000Z` */
export function toIsoTimestamp(displayTimestamp: string): string {
  return `${displayTimestamp.replace(" ", "T")}.000Z`;
}

function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  let end = max - 1;
  // Never split a surrogate pair.
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end -= 1;
  return `${text.slice(0, end)}…`;
}

/**
 * Embed posted through a bot session. Carries the display timestamp as a
 * third field next to Level and Module.
 */
export function formatBotEmbed(record: RenderableRecord): DiscordEmbed {
  const timestamp = getTimestamp(record);

  return {
    description: truncate(record.message, MAX_DESCRIPTION_LENGTH),
    color: getColor(record.level),
    timestamp: toIsoTimestamp(timestamp),
    fields: [
      { name: "Level", value: record.levelName, inline: true },
      { name: "Module", value: record.module, inline: true },
      { name: "Timestamp", value: timestamp, inline: true },
    ],
  };
}

/** JSON body for a webhook POST. */
export function formatWebhookPayload(record: RenderableRecord): WebhookPayload {
  const timestamp = getTimestamp(record);

  return {
    embeds: [
      {
        description: truncate(record.message, MAX_DESCRIPTION_LENGTH),
        color: getColor(record.level),
        timestamp: toIsoTimestamp(timestamp),
        fields: [
          { name: "Level", value: record.levelName, inline: true },
          { name: "Module", value: record.module, inline: true },
        ],
      },
    ],
  };
}
