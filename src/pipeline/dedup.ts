import { eq } from "drizzle-orm";
import type { Logger } from "pino";
import { processedPosts } from "../db/schema";
import type { ProcessedPost } from "../db/schema";
import type { AppDatabase } from "../db";
import { PersistenceError } from "../errors";
import { selectDeliverableMedia } from "./items";
import type { RawItem } from "./types";

export type DedupStore = {
  /** True iff a processed record exists for `id`. */
  readonly has: (id: string) => boolean;
  /**
   * Records `item` as delivered. Call once per id, after delivery succeeded;
   * a second call for the same id throws PersistenceError.
   */
  readonly markProcessed: (item: RawItem) => ProcessedPost;
};

export function createDedupStore(
  db: AppDatabase,
  logger: Logger,
  now: () => Date = () => new Date(),
): DedupStore {
  function has(id: string): boolean {
    try {
      const existing = db
        .select({ id: processedPosts.id })
        .from(processedPosts)
        .where(eq(processedPosts.id, id))
        .get();
      return existing !== undefined;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PersistenceError(`lookup of ${id} failed: ${message}`, {
        cause: err,
      });
    }
  }

  function markProcessed(item: RawItem): ProcessedPost {
    const record: ProcessedPost = {
      id: item.id,
      content: item.content,
      createdAt: item.createdAt,
      sentAt: now(),
      username: item.author.username ?? "",
      displayName: item.author.displayName ?? "",
      mediaAttachments: selectDeliverableMedia(item.mediaAttachments),
    };

    try {
      db.insert(processedPosts).values(record).run();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ itemId: item.id, error: message }, "failed to mark item as processed");
      throw new PersistenceError(`insert of ${item.id} failed: ${message}`, {
        cause: err,
      });
    }

    logger.info({ itemId: item.id }, "item marked as processed");
    return record;
  }

  return { has, markProcessed };
}
