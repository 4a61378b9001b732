// pattern: Imperative Shell
import * as cheerio from "cheerio";
import { z } from "zod";
import type { Logger } from "pino";
import type { AppSecrets, ProxyConfig } from "../config";
import { TransportError, UpstreamFormatError } from "../errors";

/**
 * What every intermediary hands back, whichever service produced it.
 * `json()` throws UpstreamFormatError when the body is not JSON.
 */
export type UpstreamResponse = {
  readonly status: number;
  readonly body: () => string;
  readonly json: () => unknown;
};

export type RequestHeaders = Readonly<Record<string, string>>;

export type RequestIntermediary = {
  readonly kind: ProxyConfig["kind"];
  readonly get: (
    url: string,
    headers: RequestHeaders,
    timeoutMs: number,
  ) => Promise<UpstreamResponse>;
};

const SCRAPEOPS_ENDPOINT = "https://proxy.scrapeops.io/v1/";

const flareSolverrReplySchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  solution: z
    .object({
      status: z.number().int().optional(),
      response: z.string(),
    })
    .optional(),
});

export function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new UpstreamFormatError(
      `response is not valid JSON (${message}): ${text.slice(0, 200)}`,
      { cause: err },
    );
  }
}

/**
 * Browser-based solvers render JSON endpoints as an HTML page with the
 * payload inside a `<pre>` element.
 */
export function parseJsonFromHtml(html: string): unknown {
  try {
    return JSON.parse(html);
  } catch {
    const pre = cheerio.load(html)("pre").first();
    if (pre.length === 0) {
      throw new UpstreamFormatError(
        `no <pre> element in solver response: ${html.slice(0, 200)}`,
      );
    }
    return parseJsonBody(pre.text());
  }
}

function textResponse(
  status: number,
  text: string,
  decode: (text: string) => unknown = parseJsonBody,
): UpstreamResponse {
  return {
    status,
    body: () => text,
    json: () => decode(text),
  };
}

export function buildScrapeOpsUrl(
  apiKey: string,
  country: string,
  url: string,
): string {
  const params = new URLSearchParams({ api_key: apiKey, url, country });
  return `${SCRAPEOPS_ENDPOINT}?${params.toString()}`;
}

export function createDirectIntermediary(): RequestIntermediary {
  return {
    kind: "direct",
    get: async (url, headers, timeoutMs) => {
      const response = await fetch(url, {
        headers: { ...headers },
        signal: AbortSignal.timeout(timeoutMs),
      });
      return textResponse(response.status, await response.text());
    },
  };
}

export function createScrapeOpsIntermediary(
  apiKey: string,
  country: string,
): RequestIntermediary {
  return {
    kind: "scrapeops",
    get: async (url, headers, timeoutMs) => {
      const response = await fetch(buildScrapeOpsUrl(apiKey, country, url), {
        headers: { ...headers },
        signal: AbortSignal.timeout(timeoutMs),
      });
      return textResponse(response.status, await response.text());
    },
  };
}

export function createFlareSolverrIntermediary(
  address: string,
  port: number,
  maxTimeoutMs: number,
  logger: Logger,
): RequestIntermediary {
  const endpoint = `http://${address}:${port}/v1`;

  return {
    kind: "flaresolverr",
    get: async (url, headers, timeoutMs) => {
      logger.debug({ url }, "requesting through flaresolverr");

      const response = await fetch(endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          cmd: "request.get",
          url,
          maxTimeout: maxTimeoutMs,
          headers,
        }),
        signal: AbortSignal.timeout(timeoutMs + maxTimeoutMs),
      });

      const text = await response.text();
      if (!response.ok) {
        return textResponse(response.status, text);
      }

      const reply = flareSolverrReplySchema.safeParse(parseJsonBody(text));
      if (!reply.success) {
        throw new UpstreamFormatError(
          `unexpected flaresolverr reply: ${text.slice(0, 200)}`,
        );
      }
      if (reply.data.status !== "ok" || !reply.data.solution) {
        throw new TransportError(
          `flaresolverr error: ${reply.data.message ?? reply.data.status}`,
        );
      }

      logger.debug(
        { url, preview: reply.data.solution.response.slice(0, 500) },
        "flaresolverr solution received",
      );

      return textResponse(
        reply.data.solution.status ?? 200,
        reply.data.solution.response,
        parseJsonFromHtml,
      );
    },
  };
}

export function createIntermediary(
  proxy: ProxyConfig,
  secrets: AppSecrets,
  logger: Logger,
): RequestIntermediary {
  switch (proxy.kind) {
    case "direct":
      return createDirectIntermediary();
    case "scrapeops":
      if (!secrets.scrapeOpsApiKey) {
        throw new Error("scrapeops proxy selected but no API key configured");
      }
      return createScrapeOpsIntermediary(secrets.scrapeOpsApiKey, proxy.country);
    case "flaresolverr":
      return createFlareSolverrIntermediary(
        proxy.address,
        proxy.port,
        proxy.maxTimeoutMs,
        logger,
      );
  }
}
