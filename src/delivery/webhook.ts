// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import { sleep as defaultSleep } from "../timing";
import type { SleepFn } from "../timing";
import type { NotificationPayload } from "../pipeline/types";
import type { RateLimiter } from "./rate-limiter";

export type DeliveryFailure = {
  readonly kind: "validation" | "rejected" | "rate_limited" | "http" | "transport";
  readonly status: number | null;
  readonly message: string;
  readonly body: string | null;
  readonly retryable: boolean;
};

/**
 * Discriminated union result of one delivery. Never throws; a failed
 * delivery leaves the item unrecorded so the next cycle tries again.
 */
export type DeliveryResult =
  | { readonly success: true; readonly status: number }
  | { readonly success: false; readonly error: DeliveryFailure };

export type DeliveryChannel = {
  readonly deliver: (payload: NotificationPayload) => Promise<DeliveryResult>;
};

export type WebhookChannelOptions = {
  readonly webhookUrl: string;
  readonly username: string;
  readonly timeoutMs: number;
  readonly defaultRetryAfterSeconds: number;
  readonly rateLimiter: RateLimiter;
  readonly sleep?: SleepFn;
};

type WebhookReply = {
  readonly status: number;
  readonly body: string;
};

const retryAfterSchema = z.object({
  retry_after: z.number().nonnegative(),
});

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Seconds to wait after a 429, from the receiver's JSON body.
 */
export function readRetryAfter(body: string, fallbackSeconds: number): number {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return fallbackSeconds;
  }
  const result = retryAfterSchema.safeParse(parsed);
  return result.success ? result.data.retry_after : fallbackSeconds;
}

/**
 * JSON when there is nothing to attach, multipart with `payload_json` and
 * one `files[n]` part per attachment otherwise.
 */
export function buildWebhookBody(
  payload: NotificationPayload,
  username: string,
): string | FormData {
  if (payload.attachments.length === 0) {
    return JSON.stringify({ content: payload.text, username });
  }

  const form = new FormData();
  form.append(
    "payload_json",
    JSON.stringify({
      content: payload.text,
      username,
      attachments: payload.attachments.map((a, id) => ({ id, filename: a.filename })),
    }),
  );
  payload.attachments.forEach((a, index) => {
    form.append(
      `files[${index}]`,
      new Blob([a.data], { type: a.contentType || "application/octet-stream" }),
      a.filename,
    );
  });
  return form;
}

export function createWebhookChannel(
  options: WebhookChannelOptions,
  logger: Logger,
): DeliveryChannel {
  const sleep = options.sleep ?? defaultSleep;

  async function send(payload: NotificationPayload): Promise<WebhookReply> {
    await options.rateLimiter.acquire();

    const body = buildWebhookBody(payload, options.username);
    const response = await fetch(options.webhookUrl, {
      method: "POST",
      headers:
        typeof body === "string" ? { "Content-Type": "application/json" } : undefined,
      body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    return { status: response.status, body: await response.text() };
  }

  async function deliver(payload: NotificationPayload): Promise<DeliveryResult> {
    if (!payload.text.trim()) {
      logger.warn("empty message, refusing to deliver");
      return {
        success: false,
        error: {
          kind: "validation",
          status: null,
          message: "notification text is empty",
          body: null,
          retryable: false,
        },
      };
    }

    try {
      let reply = await send(payload);

      if (reply.status === 429) {
        const retryAfter = readRetryAfter(reply.body, options.defaultRetryAfterSeconds);
        logger.warn({ retryAfter }, "webhook rate limit hit, waiting before retry");
        await sleep(retryAfter * 1000);
        reply = await send(payload);
      }

      if (reply.status === 400) {
        logger.error(
          {
            status: reply.status,
            length: payload.text.length,
            preview: payload.text.slice(0, 500),
            body: reply.body,
          },
          "webhook rejected payload",
        );
        return {
          success: false,
          error: {
            kind: "rejected",
            status: reply.status,
            message: "webhook rejected payload",
            body: reply.body,
            retryable: false,
          },
        };
      }

      if (!isSuccess(reply.status)) {
        const rateLimited = reply.status === 429;
        logger.error(
          { status: reply.status, body: reply.body },
          "webhook delivery failed",
        );
        return {
          success: false,
          error: {
            kind: rateLimited ? "rate_limited" : "http",
            status: reply.status,
            message: `webhook returned status ${reply.status}`,
            body: reply.body,
            retryable: rateLimited || reply.status >= 500,
          },
        };
      }

      logger.info(
        { status: reply.status, attachments: payload.attachments.length },
        "notification delivered",
      );
      return { success: true, status: reply.status };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "webhook request failed");
      return {
        success: false,
        error: { kind: "transport", status: null, message, body: null, retryable: true },
      };
    }
  }

  return { deliver };
}
