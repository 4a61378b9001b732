// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import { sleep as defaultSleep } from "../timing";
import type { SleepFn } from "../timing";
import type { RequestIntermediary, UpstreamResponse } from "./intermediary";
import { accountLookupSchema, toRawItem, upstreamStatusSchema } from "./items";
import type { RawItem } from "./types";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export type FetchFailure = {
  readonly kind: "transport" | "http";
  readonly status: number | null;
  readonly message: string;
  readonly retryable: boolean;
};

export type RequestOutcome =
  | { readonly ok: true; readonly response: UpstreamResponse; readonly attempts: number }
  | { readonly ok: false; readonly error: FetchFailure; readonly attempts: number };

export type FeedFetcherOptions = {
  readonly instance: string;
  readonly username: string;
  readonly pageSize: number;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  readonly intermediary: RequestIntermediary;
  readonly sleep?: SleepFn;
};

export type FeedFetcher = {
  readonly fetchLatest: () => Promise<ReadonlyArray<RawItem>>;
};

/**
 * Timeouts, throttling and server-side failures may clear up on their own;
 * any other 4xx (bad credentials, unknown account) will not.
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

export function buildRequestHeaders(
  instance: string,
  username: string,
): Record<string, string> {
  return {
    "User-Agent": USER_AGENT,
    Accept: "application/json",
    "Accept-Language": "en-US,en;q=0.5",
    Referer: `https://${instance}/@${username}`,
    Origin: `https://${instance}`,
  };
}

export function buildLookupUrl(instance: string, username: string): string {
  const params = new URLSearchParams({ acct: username });
  return `https://${instance}/api/v1/accounts/lookup?${params.toString()}`;
}

export function buildStatusesUrl(
  instance: string,
  accountId: string,
  pageSize: number,
): string {
  const params = new URLSearchParams({
    exclude_replies: "true",
    exclude_reblogs: "true",
    limit: String(pageSize),
  });
  return `https://${instance}/api/v1/accounts/${encodeURIComponent(accountId)}/statuses?${params.toString()}`;
}

/**
 * Creates the feed fetcher. Each upstream request is attempted up to
 * `maxRetries` times with exponential backoff between attempts; the fetcher
 * itself never throws and answers an empty list when the page can't be read.
 */
export function createFeedFetcher(
  options: FeedFetcherOptions,
  logger: Logger,
): FeedFetcher {
  const sleep = options.sleep ?? defaultSleep;
  const headers = buildRequestHeaders(options.instance, options.username);

  async function attempt(url: string): Promise<RequestOutcome> {
    try {
      const response = await options.intermediary.get(
        url,
        headers,
        options.timeoutMs,
      );
      if (response.status >= 200 && response.status < 300) {
        return { ok: true, response, attempts: 1 };
      }

      logger.error(
        { url, status: response.status, body: response.body().slice(0, 500) },
        "upstream returned http error",
      );
      return {
        ok: false,
        attempts: 1,
        error: {
          kind: "http",
          status: response.status,
          message: `HTTP ${response.status}`,
          retryable: isRetryableStatus(response.status),
        },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        attempts: 1,
        error: { kind: "transport", status: null, message, retryable: true },
      };
    }
  }

  async function requestWithRetry(url: string): Promise<RequestOutcome> {
    for (let attemptNumber = 1; ; attemptNumber++) {
      const outcome = await attempt(url);
      if (outcome.ok) {
        return { ...outcome, attempts: attemptNumber };
      }

      if (!outcome.error.retryable || attemptNumber >= options.maxRetries) {
        return { ...outcome, attempts: attemptNumber };
      }

      const delayMs = options.backoffBaseMs * 2 ** (attemptNumber - 1);
      logger.warn(
        { url, attempt: attemptNumber, delayMs, error: outcome.error.message },
        "upstream request failed, backing off",
      );
      await sleep(delayMs);
    }
  }

  async function fetchLatest(): Promise<ReadonlyArray<RawItem>> {
    try {
      const lookupUrl = buildLookupUrl(options.instance, options.username);
      const lookup = await requestWithRetry(lookupUrl);
      if (!lookup.ok) {
        logger.error(
          { url: lookupUrl, attempts: lookup.attempts, error: lookup.error.message },
          "account lookup failed",
        );
        return [];
      }

      const account = accountLookupSchema.safeParse(lookup.response.json());
      if (!account.success) {
        logger.error(
          { username: options.username },
          "could not find account id in lookup response",
        );
        return [];
      }
      logger.debug({ accountId: account.data.id }, "account resolved");

      const statusesUrl = buildStatusesUrl(
        options.instance,
        account.data.id,
        options.pageSize,
      );
      const statuses = await requestWithRetry(statusesUrl);
      if (!statuses.ok) {
        logger.error(
          { url: statusesUrl, attempts: statuses.attempts, error: statuses.error.message },
          "statuses request failed",
        );
        return [];
      }

      const page = z.array(z.unknown()).safeParse(statuses.response.json());
      if (!page.success) {
        logger.error(
          { body: statuses.response.body().slice(0, 500) },
          "statuses response is not a list",
        );
        return [];
      }

      const items: Array<RawItem> = [];
      for (const entry of page.data) {
        const parsed = upstreamStatusSchema.safeParse(entry);
        if (!parsed.success) {
          logger.warn(
            { issues: parsed.error.issues.map((i) => i.path.join(".")) },
            "dropping malformed status",
          );
          continue;
        }
        items.push(toRawItem(parsed.data));
      }

      logger.info({ itemCount: items.length }, "feed page retrieved");
      return items;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "feed fetch failed");
      return [];
    }
  }

  return { fetchLatest };
}
