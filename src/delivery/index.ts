export { createRateLimiter } from "./rate-limiter";
export type { RateLimiter, RateLimiterOptions } from "./rate-limiter";

export { createWebhookChannel, buildWebhookBody, readRetryAfter } from "./webhook";
export type {
  DeliveryChannel,
  DeliveryFailure,
  DeliveryResult,
  WebhookChannelOptions,
} from "./webhook";
