// pattern: Functional Core
import * as cheerio from "cheerio";

// Not preceded by an opening bracket, so already-wrapped links are left alone.
// Parentheses are kept only in balanced pairs, so `(see https://x)` stops before `)`.
const BARE_URL_PATTERN = /(?<![<(\[])\bhttps?:\/\/(?:[^\s<>()]|\([^\s<>()]*\))+/g;

/**
 * Wraps bare URLs in angle brackets, which suppresses link previews
 * on the receiving channel.
 */
export function wrapBareUrls(text: string): string {
  return text.replace(BARE_URL_PATTERN, (url) => `<${url}>`);
}

/**
 * Converts post HTML into plain text for the notification body.
 * `<br>` becomes a newline and each `<p>` starts on a new line; blank-line
 * runs collapse to a single blank line and horizontal whitespace to one space.
 */
export function stripMarkup(html: string): string {
  if (!html) {
    return "";
  }

  const $ = cheerio.load(html, null, false);
  $("br").replaceWith("\n");
  $("p").prepend("\n");

  const text = $.root()
    .text()
    .replace(/\r\n?/g, "\n")
    .replace(/\n\s*\n/g, "\n\n")
    .replace(/[^\S\n]+/g, " ")
    .trim();

  return wrapBareUrls(text);
}
