import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createTestItem } from "./test-utils/db";
import { createMockLogger } from "./test-utils/logger";
import type { CycleDeps } from "./pipeline/cycle";

vi.mock("./pipeline/cycle");

const emptyResult = {
  fetchedCount: 0,
  skippedCount: 0,
  deliveredCount: 0,
  failedCount: 0,
};

function createDeps(): CycleDeps {
  return {
    fetcher: { fetchLatest: vi.fn().mockResolvedValue([createTestItem()]) },
    store: { has: vi.fn(), markProcessed: vi.fn() },
    channel: { deliver: vi.fn() },
    relayMedia: vi.fn(),
    format: { postType: "post", fallbackUsername: "tester" },
    logger: createMockLogger(),
  };
}

describe("createPollScheduler", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should run the first cycle immediately", async () => {
    const { createPollScheduler } = await import("./scheduler");
    const { runPollCycle } = await import("./pipeline/cycle");
    vi.mocked(runPollCycle).mockResolvedValue(emptyResult);

    const deps = createDeps();
    const scheduler = createPollScheduler(deps, 300, createMockLogger());

    expect(vi.mocked(runPollCycle)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(runPollCycle)).toHaveBeenCalledWith(deps);
    scheduler.stop();
  });

  it("should wait the interval after a cycle ends before starting the next", async () => {
    const { createPollScheduler } = await import("./scheduler");
    const { runPollCycle } = await import("./pipeline/cycle");
    vi.mocked(runPollCycle).mockImplementation(
      () =>
        new Promise((resolve) => {
          setTimeout(() => resolve(emptyResult), 10_000);
        }),
    );

    const scheduler = createPollScheduler(createDeps(), 300, createMockLogger());

    await vi.advanceTimersByTimeAsync(309_999);
    expect(vi.mocked(runPollCycle)).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(vi.mocked(runPollCycle)).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });

  it("should log a failed cycle and keep polling", async () => {
    const { createPollScheduler } = await import("./scheduler");
    const { runPollCycle } = await import("./pipeline/cycle");
    vi.mocked(runPollCycle)
      .mockRejectedValueOnce(new Error("store unavailable"))
      .mockResolvedValue(emptyResult);

    const logger = createMockLogger();
    const scheduler = createPollScheduler(createDeps(), 60, logger);

    await vi.advanceTimersByTimeAsync(0);
    expect(vi.mocked(logger.error)).toHaveBeenCalledWith(
      { error: "store unavailable" },
      "poll cycle failed",
    );

    await vi.advanceTimersByTimeAsync(60_000);
    expect(vi.mocked(runPollCycle)).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });

  it("should not start another cycle after stop()", async () => {
    const { createPollScheduler } = await import("./scheduler");
    const { runPollCycle } = await import("./pipeline/cycle");
    vi.mocked(runPollCycle).mockResolvedValue(emptyResult);

    const scheduler = createPollScheduler(createDeps(), 60, createMockLogger());
    await vi.advanceTimersByTimeAsync(0);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(600_000);

    expect(vi.mocked(runPollCycle)).toHaveBeenCalledTimes(1);
  });

  it("should not schedule a follow-up when stopped mid-cycle", async () => {
    const { createPollScheduler } = await import("./scheduler");
    const { runPollCycle } = await import("./pipeline/cycle");
    vi.mocked(runPollCycle).mockImplementation(
      () =>
        new Promise((resolve) => {
          setTimeout(() => resolve(emptyResult), 5_000);
        }),
    );

    const scheduler = createPollScheduler(createDeps(), 60, createMockLogger());
    scheduler.stop();

    await vi.advanceTimersByTimeAsync(120_000);
    expect(vi.mocked(runPollCycle)).toHaveBeenCalledTimes(1);
  });
});
