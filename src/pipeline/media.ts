// pattern: Imperative Shell
import type { Logger } from "pino";
import type { DeliverableMedia, RelayedMedia } from "./types";

export type MediaRelayFn = (
  media: DeliverableMedia,
) => Promise<RelayedMedia | null>;

const FALLBACK_FILENAME = "attachment";

type ExtensionRule = {
  readonly matches: (contentType: string) => boolean;
  readonly accepted: ReadonlyArray<string>;
  readonly append: string;
};

const EXTENSION_RULES: ReadonlyArray<ExtensionRule> = [
  { matches: (t) => t.includes("image/jpeg"), accepted: [".jpg", ".jpeg"], append: ".jpg" },
  { matches: (t) => t.includes("image/png"), accepted: [".png"], append: ".png" },
  { matches: (t) => t.includes("image/gif"), accepted: [".gif"], append: ".gif" },
  { matches: (t) => t.includes("video/"), accepted: [".mp4", ".mov", ".webm"], append: ".mp4" },
];

function lastPathSegment(url: string): string {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    path = url.split(/[?#]/)[0] ?? "";
  }
  const segment = path.split("/").pop() ?? "";
  return segment || FALLBACK_FILENAME;
}

/**
 * Filename for a downloaded attachment: the last path segment of the URL,
 * with an extension appended when it doesn't agree with the content type.
 * An existing extension is never removed.
 */
export function deriveFilename(url: string, contentType: string): string {
  const filename = lastPathSegment(url);
  const type = contentType.toLowerCase();
  const lower = filename.toLowerCase();

  const rule = EXTENSION_RULES.find((r) => r.matches(type));
  if (rule && !rule.accepted.some((ext) => lower.endsWith(ext))) {
    return filename + rule.append;
  }
  return filename;
}

/**
 * Creates the media relay. A failed download is logged and answered with
 * null, and the notification goes out without that attachment.
 */
export function createMediaRelay(timeoutMs: number, logger: Logger): MediaRelayFn {
  return async function relayMedia(
    media: DeliverableMedia,
  ): Promise<RelayedMedia | null> {
    try {
      const response = await fetch(media.url, {
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        logger.error(
          { url: media.url, status: response.status },
          "media download failed",
        );
        return null;
      }

      const contentType = (response.headers.get("content-type") ?? "").toLowerCase();
      const data = new Uint8Array(await response.arrayBuffer());
      const filename = deriveFilename(media.url, contentType);

      logger.debug({ url: media.url, filename, bytes: data.byteLength }, "media downloaded");
      return { data, filename, contentType };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ url: media.url, error: message }, "media download failed");
      return null;
    }
  };
}
