import type { Logger } from "pino";
import { runPollCycle } from "./pipeline/cycle";
import type { CycleDeps } from "./pipeline/cycle";

export type PollScheduler = {
  readonly stop: () => void;
};

/**
 * Starts the poll loop: runs a cycle right away, then waits `intervalSeconds`
 * after each cycle finishes before starting the next. Cycles never overlap.
 *
 * Any error escaping a cycle is logged and the loop carries on.
 *
 * @param deps - Collaborators for the poll cycle
 * @param intervalSeconds - Delay between the end of one cycle and the next
 * @param logger - Logger for loop-level events
 * @returns A PollScheduler whose stop() cancels the pending wait
 */
export function createPollScheduler(
  deps: CycleDeps,
  intervalSeconds: number,
  logger: Logger,
): PollScheduler {
  let stopped = false;
  let timer: NodeJS.Timeout | null = null;

  const tick = async (): Promise<void> => {
    timer = null;
    logger.info("poll cycle starting");

    try {
      await runPollCycle(deps);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "poll cycle failed");
    }

    if (stopped) return;

    logger.info({ delaySeconds: intervalSeconds }, "waiting before next check");
    timer = setTimeout(run, intervalSeconds * 1000);
  };

  const run = (): void => {
    tick().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "poll loop error");
    });
  };

  run();

  return {
    stop: () => {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
  };
}
