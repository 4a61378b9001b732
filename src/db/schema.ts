import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

// ---------- JSON column types ----------

export type StoredMedia = {
  readonly type: "image" | "video" | "gifv";
  readonly url: string;
};

// ---------- Tables ----------

/**
 * One row per delivered post. Presence of a row is the dedup signal;
 * rows are written once and never updated.
 */
export const processedPosts = sqliteTable(
  "processed_posts",
  {
    id: text("id").primaryKey(),
    content: text("content").notNull(),
    createdAt: text("created_at").notNull(),
    sentAt: integer("sent_at", { mode: "timestamp_ms" }).notNull(),
    username: text("username").notNull(),
    displayName: text("display_name").notNull(),
    mediaAttachments: text("media_attachments", { mode: "json" })
      .$type<Array<StoredMedia>>()
      .notNull(),
  },
  (table) => ({
    sentAtIdx: index("processed_posts_sent_at_idx").on(table.sentAt),
  }),
);

export type ProcessedPost = typeof processedPosts.$inferSelect;
