// pattern: Imperative Shell
import type { Logger } from "pino";
import type { DeliveryChannel } from "../delivery";
import type { DedupStore } from "./dedup";
import type { FeedFetcher } from "./fetcher";
import { formatNotification, parseCreatedAt } from "./formatter";
import type { FormatOptions } from "./formatter";
import type { MediaRelayFn } from "./media";
import type { CycleResult, RawItem, RelayedMedia } from "./types";

export type CycleDeps = {
  readonly fetcher: FeedFetcher;
  readonly store: DedupStore;
  readonly channel: DeliveryChannel;
  readonly relayMedia: MediaRelayFn;
  readonly format: FormatOptions;
  readonly logger: Logger;
};

type ItemOutcome = "delivered" | "failed";

/**
 * Newest first, reading timestamps the way the footer does. Items whose
 * timestamp can't be read sort last, in fetch order.
 */
export function sortNewestFirst(items: ReadonlyArray<RawItem>): Array<RawItem> {
  const time = (item: RawItem): number =>
    parseCreatedAt(item.createdAt)?.getTime() ?? Number.NEGATIVE_INFINITY;
  return [...items].sort((a, b) => {
    const ta = time(a);
    const tb = time(b);
    if (ta === tb) return 0;
    return tb > ta ? 1 : -1;
  });
}

async function processItem(item: RawItem, deps: CycleDeps): Promise<ItemOutcome> {
  const { logger } = deps;
  logger.info({ itemId: item.id }, "processing new item");

  const notification = formatNotification(item, deps.format, logger);
  if (!notification) {
    logger.warn({ itemId: item.id }, "item could not be formatted, skipping");
    return "failed";
  }

  const attachments: Array<RelayedMedia> = [];
  for (const media of notification.media) {
    const relayed = await deps.relayMedia(media);
    if (relayed) {
      attachments.push(relayed);
    }
  }

  const result = await deps.channel.deliver({ text: notification.text, attachments });
  if (!result.success) {
    logger.error(
      {
        itemId: item.id,
        kind: result.error.kind,
        status: result.error.status,
        retryable: result.error.retryable,
      },
      "delivery failed, item left for next cycle",
    );
    return "failed";
  }

  deps.store.markProcessed(item);
  return "delivered";
}

/**
 * One poll cycle: fetch, drop already-delivered ids, then format, relay,
 * deliver and record each remaining item, newest first.
 *
 * A failure while handling one item is logged and the next item proceeds.
 * Failures while fetching or filtering propagate to the caller.
 */
export async function runPollCycle(deps: CycleDeps): Promise<CycleResult> {
  const { logger } = deps;

  const items = await deps.fetcher.fetchLatest();
  const ordered = sortNewestFirst(items.filter((item) => item.id.length > 0));
  const pending = ordered.filter((item) => {
    if (deps.store.has(item.id)) {
      logger.debug({ itemId: item.id }, "item already processed, skipping");
      return false;
    }
    return true;
  });

  let deliveredCount = 0;
  let failedCount = 0;

  for (const item of pending) {
    try {
      const outcome = await processItem(item, deps);
      if (outcome === "delivered") {
        deliveredCount++;
      } else {
        failedCount++;
      }
    } catch (err) {
      failedCount++;
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ itemId: item.id, error: message }, "unexpected error processing item");
    }
  }

  const result: CycleResult = {
    fetchedCount: items.length,
    skippedCount: ordered.length - pending.length,
    deliveredCount,
    failedCount,
  };
  logger.info(result, "poll cycle complete");
  return result;
}
