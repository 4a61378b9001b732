import { migrate } from "drizzle-orm/better-sqlite3/migrator";
import pino from "pino";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { processedPosts } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import type { RawItem } from "../pipeline/types";

/**
 * Creates an in-memory SQLite test database with all migrations applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  migrate(db, { migrationsFolder: "./drizzle" });
  return db;
}

/**
 * Inserts a processed-post row directly, bypassing the dedup store.
 * @returns The id of the inserted row.
 */
export function seedProcessedPost(
  db: AppDatabase,
  overrides?: Partial<typeof processedPosts.$inferInsert>,
): string {
  const result = db
    .insert(processedPosts)
    .values({
      id: `post-${Date.now()}-${Math.random()}`,
      content: "<p>Seeded post</p>",
      createdAt: "2025-06-16T12:00:00Z",
      sentAt: new Date("2025-06-16T12:05:00Z"),
      username: "tester",
      displayName: "Test Account",
      mediaAttachments: [],
      ...overrides,
    })
    .returning({ id: processedPosts.id })
    .get();

  return result.id;
}

/**
 * Builds a fetched item with sensible defaults.
 */
export function createTestItem(overrides?: Partial<RawItem>): RawItem {
  return {
    id: "1",
    createdAt: "2025-06-16T12:00:00Z",
    content: "<p>Hello</p>",
    author: { username: "tester", displayName: "Test Account" },
    mediaAttachments: [],
    ...overrides,
  };
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(): AppConfig {
  return {
    source: {
      instance: "social.example.com",
      username: "tester",
      postType: "post",
      pageSize: 40,
      proxy: { kind: "direct" },
    },
    request: {
      timeoutMs: 30000,
      maxRetries: 3,
      backoffBaseMs: 1000,
    },
    delivery: {
      username: "Feed Relay",
      rateLimit: { limit: 30, windowMs: 60000 },
      defaultRetryAfterSeconds: 5,
    },
    poll: {
      intervalSeconds: 300,
    },
  };
}

/**
 * Creates a typed tRPC caller for invoking router procedures directly.
 */
export function createTestCaller(
  db: AppDatabase,
  configOverrides?: Partial<AppConfig>,
) {
  const createCaller = createCallerFactory(appRouter);
  const config = { ...createTestConfig(), ...configOverrides };
  const logger = pino({ level: "silent" });

  return createCaller({ db, config, logger });
}
