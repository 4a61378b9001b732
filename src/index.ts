import { resolve } from "node:path";
import { migrate } from "drizzle-orm/better-sqlite3/migrator";
import { createLogger } from "./logger";
import { loadConfig, loadSecrets } from "./config";
import type { AppConfig, AppSecrets } from "./config";
import { createDatabase } from "./db";
import type { DatabaseResult } from "./db";
import {
  createDedupStore,
  createFeedFetcher,
  createIntermediary,
  createMediaRelay,
} from "./pipeline";
import { createRateLimiter, createWebhookChannel } from "./delivery";
import { createPollScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feed-relay.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feed-relay starting");

  let config: AppConfig;
  let secrets: AppSecrets;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    secrets = loadSecrets(process.env, config);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      source: `@${config.source.username}@${config.source.instance}`,
      proxy: config.source.proxy.kind,
      intervalSeconds: config.poll.intervalSeconds,
    },
    "config loaded",
  );

  let database: DatabaseResult;
  try {
    database = createDatabase(resolve(DATABASE_URL));
    migrate(database.db, { migrationsFolder: resolve("./drizzle") });
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "dedup store unavailable",
    );
    process.exit(1);
  }
  logger.info("database migrations applied");

  const { db, close: closeDb } = database;

  const fetcher = createFeedFetcher(
    {
      instance: config.source.instance,
      username: config.source.username,
      pageSize: config.source.pageSize,
      timeoutMs: config.request.timeoutMs,
      maxRetries: config.request.maxRetries,
      backoffBaseMs: config.request.backoffBaseMs,
      intermediary: createIntermediary(config.source.proxy, secrets, logger),
    },
    logger,
  );

  const channel = createWebhookChannel(
    {
      webhookUrl: secrets.webhookUrl,
      username: config.delivery.username,
      timeoutMs: config.request.timeoutMs,
      defaultRetryAfterSeconds: config.delivery.defaultRetryAfterSeconds,
      rateLimiter: createRateLimiter(config.delivery.rateLimit),
    },
    logger,
  );

  const scheduler = createPollScheduler(
    {
      fetcher,
      store: createDedupStore(db, logger),
      channel,
      relayMedia: createMediaRelay(config.request.timeoutMs, logger),
      format: {
        postType: config.source.postType,
        fallbackUsername: config.source.username,
      },
      logger,
    },
    config.poll.intervalSeconds,
    logger,
  );

  const app = createApiServer({ db, config, logger });
  const server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "status api listening");
  });

  registerShutdownHandlers({
    schedulers: [scheduler],
    closeServer: () => server.close(),
    closeDb,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
