// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents an object with a stop method for graceful shutdown.
 */
export type Stoppable = {
  readonly stop: () => void;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly closeServer?: () => void;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers that stop the poll loop, close the
 * status API and the database, then exit with status 0.
 *
 * A second signal during shutdown is ignored. An item delivered but not yet
 * recorded when the signal arrives is re-sent on the next start.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const step = (label: string, action: () => void) => {
    try {
      action();
      deps.logger.info(`${label} done`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, `${label} failed`);
    }
  };

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      step("stop scheduler", () => scheduler.stop());
    }

    const closeServer = deps.closeServer;
    if (closeServer) {
      step("close api server", closeServer);
    }

    step("close database", deps.closeDb);

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
