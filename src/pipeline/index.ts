export { createFeedFetcher, isRetryableStatus } from "./fetcher";
export { createIntermediary } from "./intermediary";
export { createDedupStore } from "./dedup";
export { createMediaRelay, deriveFilename } from "./media";
export { formatNotification, composeMessage, truncateContent } from "./formatter";
export { stripMarkup } from "./markup";
export { runPollCycle } from "./cycle";
export type { FeedFetcher, FeedFetcherOptions, RequestOutcome } from "./fetcher";
export type { RequestIntermediary, UpstreamResponse } from "./intermediary";
export type { DedupStore } from "./dedup";
export type { MediaRelayFn } from "./media";
export type { FormatOptions } from "./formatter";
export type { CycleDeps } from "./cycle";
export type {
  RawItem,
  MediaRef,
  Notification,
  NotificationPayload,
  RelayedMedia,
  CycleResult,
} from "./types";
