import { z } from "zod";

const proxyConfigSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("direct") }),
  z.object({
    kind: z.literal("scrapeops"),
    country: z.string().min(2).default("us"),
  }),
  z.object({
    kind: z.literal("flaresolverr"),
    address: z.string().min(1),
    port: z.number().int().positive().default(8191),
    maxTimeoutMs: z.number().int().positive().default(25000),
  }),
]);

const sourceConfigSchema = z.object({
  instance: z.string().min(1),
  username: z.string().min(1),
  postType: z.string().min(1).default("post"),
  pageSize: z.number().int().positive().max(40).default(40),
  proxy: proxyConfigSchema.default({ kind: "direct" }),
});

export const appConfigSchema = z.object({
  source: sourceConfigSchema,
  request: z
    .object({
      timeoutMs: z.number().int().positive().default(30000),
      maxRetries: z.number().int().positive().default(3),
      backoffBaseMs: z.number().int().nonnegative().default(1000),
    })
    .default({}),
  delivery: z
    .object({
      username: z.string().min(1).default("Feed Relay"),
      rateLimit: z
        .object({
          limit: z.number().int().positive().default(30),
          windowMs: z.number().int().positive().default(60000),
        })
        .default({}),
      defaultRetryAfterSeconds: z.number().nonnegative().default(5),
    })
    .default({}),
  poll: z
    .object({
      intervalSeconds: z.number().int().positive().default(300),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ProxyConfig = z.infer<typeof proxyConfigSchema>;
