// pattern: Functional Core
import type { Logger } from "pino";
import { stripMarkup } from "./markup";
import { selectDeliverableMedia } from "./items";
import type { Notification, RawItem } from "./types";

/** Receiver rejects anything longer. */
export const MESSAGE_HARD_LIMIT = 2000;

/** Header, body and footer are planned to fit in this; the rest is slack. */
export const MESSAGE_BUDGET = 1950;

const ELLIPSIS = "...";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export type FormatOptions = {
  readonly postType: string;
  readonly fallbackUsername: string;
};

// Lengths are in code points so a cut never lands inside a surrogate pair.
function charLength(text: string): number {
  return Array.from(text).length;
}

function sliceChars(text: string, count: number): string {
  return Array.from(text).slice(0, Math.max(0, count)).join("");
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Parses an ISO-8601 timestamp into an instant. A timestamp without a zone
 * designator is read as UTC. Returns null when unparseable.
 */
export function parseCreatedAt(value: string): Date | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const hasZone = /(?:z|[+-]\d{2}:?\d{2})$/i.test(trimmed);
  const hasTime = trimmed.includes("T");
  const date = new Date(hasTime && !hasZone ? `${trimmed}Z` : trimmed);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** e.g. `June 16, 2025 at 12:00 PM UTC` */
export function formatTimestamp(date: Date): string {
  const month = MONTHS[date.getUTCMonth()] ?? "";
  const hours = date.getUTCHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const meridiem = hours < 12 ? "AM" : "PM";
  return `${month} ${pad2(date.getUTCDate())}, ${date.getUTCFullYear()} at ${pad2(hour12)}:${pad2(date.getUTCMinutes())} ${meridiem} UTC`;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function buildHeader(
  displayName: string,
  username: string,
  postType: string,
): string {
  return `**New ${capitalize(postType)} from ${displayName} (@${username})**\n`;
}

export function buildFooter(createdAt: Date): string {
  return `\n*Posted at: ${formatTimestamp(createdAt)}*`;
}

/**
 * Shortens `content` to at most `maxLength` characters, ending in an ellipsis
 * when anything was cut. Content already within the limit is returned as is,
 * so applying this to its own output is a no-op.
 */
export function truncateContent(content: string, maxLength: number): string {
  if (charLength(content) <= maxLength) {
    return content;
  }
  return sliceChars(content, maxLength - ELLIPSIS.length) + ELLIPSIS;
}

/**
 * Joins header, body and footer under the message budget. If the header and
 * footer alone overflow the hard limit, the whole message is clamped.
 */
export function composeMessage(
  header: string,
  content: string,
  footer: string,
  logger: Logger,
): string {
  const maxContentLength =
    MESSAGE_BUDGET - charLength(header) - charLength(footer);
  const body = truncateContent(content, Math.max(0, maxContentLength));
  const message = header + body + footer;

  const length = charLength(message);
  if (length > MESSAGE_HARD_LIMIT) {
    logger.warn(
      { length, limit: MESSAGE_HARD_LIMIT },
      "message too long, applying emergency truncation",
    );
    return sliceChars(message, MESSAGE_HARD_LIMIT - ELLIPSIS.length) + ELLIPSIS;
  }

  return message;
}

/**
 * Turns one fetched item into notification text plus the media worth relaying.
 * Returns null for an item without an id or with an unreadable timestamp.
 */
export function formatNotification(
  item: RawItem,
  options: FormatOptions,
  logger: Logger,
): Notification | null {
  if (!item.id) {
    logger.error("item without id cannot be formatted");
    return null;
  }

  const createdAt = parseCreatedAt(item.createdAt);
  if (!createdAt) {
    logger.error(
      { itemId: item.id, createdAt: item.createdAt },
      "item has an invalid created_at timestamp",
    );
    return null;
  }

  const username = item.author.username || options.fallbackUsername;
  const displayName = item.author.displayName || username;

  const header = buildHeader(displayName, username, options.postType);
  const footer = buildFooter(createdAt);
  const text = composeMessage(header, stripMarkup(item.content), footer, logger);

  return { text, media: selectDeliverableMedia(item.mediaAttachments) };
}
