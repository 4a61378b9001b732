import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";

vi.mock("./formatter", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./formatter")>();
  return { ...actual, formatNotification: vi.fn(actual.formatNotification) };
});

import { formatNotification } from "./formatter";
import { runPollCycle, sortNewestFirst } from "./cycle";
import type { CycleDeps } from "./cycle";
import { createDedupStore } from "./dedup";
import type { DedupStore } from "./dedup";
import type { DeliveryChannel } from "../delivery";
import type { MediaRelayFn } from "./media";
import type { RawItem } from "./types";
import { createTestDatabase, createTestItem, seedProcessedPost } from "../test-utils/db";
import type { AppDatabase } from "../db";
import { PersistenceError } from "../errors";

const logger = pino({ level: "silent" });

describe("runPollCycle", () => {
  let db: AppDatabase;
  let store: DedupStore;
  const fetchLatest = vi.fn<() => Promise<ReadonlyArray<RawItem>>>();
  const deliver = vi.fn<DeliveryChannel["deliver"]>();
  const relayMedia = vi.fn<MediaRelayFn>();

  function deps(overrides?: Partial<CycleDeps>): CycleDeps {
    return {
      fetcher: { fetchLatest },
      store,
      channel: { deliver },
      relayMedia,
      format: { postType: "post", fallbackUsername: "tester" },
      logger,
      ...overrides,
    };
  }

  beforeEach(() => {
    vi.clearAllMocks();
    db = createTestDatabase();
    store = createDedupStore(db, logger);
    deliver.mockResolvedValue({ success: true, status: 204 });
    relayMedia.mockResolvedValue(null);
  });

  it("should only process items not already in the store", async () => {
    seedProcessedPost(db, { id: "1" });
    fetchLatest.mockResolvedValue([
      createTestItem({ id: "1", createdAt: "2025-06-16T12:00:00Z" }),
      createTestItem({ id: "2", createdAt: "2025-06-16T11:00:00Z" }),
    ]);

    const result = await runPollCycle(deps());

    expect(result).toEqual({
      fetchedCount: 2,
      skippedCount: 1,
      deliveredCount: 1,
      failedCount: 0,
    });
    expect(vi.mocked(formatNotification)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(formatNotification).mock.calls[0]?.[0].id).toBe("2");
    expect(deliver).toHaveBeenCalledTimes(1);
    expect(store.has("2")).toBe(true);
  });

  it("should never touch media or delivery for already-processed items", async () => {
    seedProcessedPost(db, { id: "seen" });
    fetchLatest.mockResolvedValue([
      createTestItem({
        id: "seen",
        mediaAttachments: [
          { type: "image", url: "https://cdn.example.com/a.png", previewUrl: null },
        ],
      }),
    ]);

    const result = await runPollCycle(deps());

    expect(result.skippedCount).toBe(1);
    expect(relayMedia).not.toHaveBeenCalled();
    expect(deliver).not.toHaveBeenCalled();
  });

  it("should mark an item only after delivery succeeds", async () => {
    const markProcessed = vi.fn(store.markProcessed);
    const trackedStore: DedupStore = { has: store.has, markProcessed };

    deliver.mockImplementation(async () => {
      expect(markProcessed).not.toHaveBeenCalled();
      return { success: true, status: 204 };
    });
    fetchLatest.mockResolvedValue([createTestItem({ id: "10" })]);

    await runPollCycle(deps({ store: trackedStore }));

    expect(markProcessed).toHaveBeenCalledTimes(1);
    expect(markProcessed.mock.calls[0]?.[0].id).toBe("10");
  });

  it("should leave an item unmarked when delivery fails", async () => {
    deliver.mockResolvedValue({
      success: false,
      error: {
        kind: "http",
        status: 500,
        message: "webhook returned status 500",
        body: "",
        retryable: true,
      },
    });
    fetchLatest.mockResolvedValue([createTestItem({ id: "3" })]);

    const result = await runPollCycle(deps());

    expect(result.failedCount).toBe(1);
    expect(result.deliveredCount).toBe(0);
    expect(store.has("3")).toBe(false);
  });

  it("should process items newest first", async () => {
    fetchLatest.mockResolvedValue([
      createTestItem({ id: "old", content: "old", createdAt: "2025-06-14T08:00:00Z" }),
      createTestItem({ id: "new", content: "new", createdAt: "2025-06-16T08:00:00Z" }),
      createTestItem({ id: "mid", content: "mid", createdAt: "2025-06-15T08:00:00Z" }),
    ]);

    await runPollCycle(deps());

    const ids = vi.mocked(formatNotification).mock.calls.map(([item]) => item.id);
    expect(ids).toEqual(["new", "mid", "old"]);
  });

  it("should keep going when one item fails unexpectedly", async () => {
    deliver
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce({ success: true, status: 204 });
    fetchLatest.mockResolvedValue([
      createTestItem({ id: "a", createdAt: "2025-06-16T12:00:00Z" }),
      createTestItem({ id: "b", createdAt: "2025-06-16T11:00:00Z" }),
    ]);

    const result = await runPollCycle(deps());

    expect(result.deliveredCount).toBe(1);
    expect(result.failedCount).toBe(1);
    expect(store.has("a")).toBe(false);
    expect(store.has("b")).toBe(true);
  });

  it("should count an item whose record cannot be written as failed", async () => {
    const failingStore: DedupStore = {
      has: () => false,
      markProcessed: () => {
        throw new PersistenceError("insert of x failed");
      },
    };
    fetchLatest.mockResolvedValue([createTestItem({ id: "x" })]);

    const result = await runPollCycle(deps({ store: failingStore }));

    expect(deliver).toHaveBeenCalledTimes(1);
    expect(result.failedCount).toBe(1);
  });

  it("should skip items that cannot be formatted", async () => {
    fetchLatest.mockResolvedValue([createTestItem({ id: "bad", createdAt: "garbage" })]);

    const result = await runPollCycle(deps());

    expect(result.failedCount).toBe(1);
    expect(deliver).not.toHaveBeenCalled();
    expect(store.has("bad")).toBe(false);
  });

  it("should attach relayed media and skip downloads that failed", async () => {
    relayMedia
      .mockResolvedValueOnce({
        data: new Uint8Array([1]),
        filename: "a.png",
        contentType: "image/png",
      })
      .mockResolvedValueOnce(null);
    fetchLatest.mockResolvedValue([
      createTestItem({
        id: "m",
        mediaAttachments: [
          { type: "image", url: "https://cdn.example.com/a", previewUrl: null },
          { type: "video", url: "https://cdn.example.com/b", previewUrl: null },
        ],
      }),
    ]);

    await runPollCycle(deps());

    expect(relayMedia).toHaveBeenCalledTimes(2);
    expect(deliver.mock.calls[0]?.[0].attachments).toEqual([
      { data: new Uint8Array([1]), filename: "a.png", contentType: "image/png" },
    ]);
  });

  it("should propagate a failure while filtering", async () => {
    const brokenStore: DedupStore = {
      has: () => {
        throw new PersistenceError("lookup of 1 failed");
      },
      markProcessed: store.markProcessed,
    };
    fetchLatest.mockResolvedValue([createTestItem({ id: "1" })]);

    await expect(runPollCycle(deps({ store: brokenStore }))).rejects.toThrow(
      PersistenceError,
    );
    expect(deliver).not.toHaveBeenCalled();
  });

  it("should do nothing on an empty page", async () => {
    fetchLatest.mockResolvedValue([]);

    const result = await runPollCycle(deps());

    expect(result).toEqual({
      fetchedCount: 0,
      skippedCount: 0,
      deliveredCount: 0,
      failedCount: 0,
    });
  });
});

describe("sortNewestFirst", () => {
  it("should put items with unreadable timestamps last", () => {
    const sorted = sortNewestFirst([
      createTestItem({ id: "x", createdAt: "" }),
      createTestItem({ id: "y", createdAt: "2025-01-01T00:00:00Z" }),
    ]);
    expect(sorted.map((i) => i.id)).toEqual(["y", "x"]);
  });

  describe("with a host timezone behind UTC", () => {
    beforeEach(() => {
      vi.stubEnv("TZ", "America/New_York");
    });

    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it("should read a timestamp without a zone as UTC", () => {
      const sorted = sortNewestFirst([
        createTestItem({ id: "a", createdAt: "2025-06-16T12:00:00" }),
        createTestItem({ id: "b", createdAt: "2025-06-16T14:00:00Z" }),
      ]);
      expect(sorted.map((i) => i.id)).toEqual(["b", "a"]);
    });
  });
});
