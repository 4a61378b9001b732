import { z } from "zod";
import type { AppConfig } from "./schema";

const secretsEnvSchema = z.object({
  DISCORD_WEBHOOK_URL: z.string().url(),
  SCRAPEOPS_API_KEY: z.string().min(1).optional(),
});

export type AppSecrets = {
  readonly webhookUrl: string;
  readonly scrapeOpsApiKey: string | null;
};

/**
 * Reads credentials from the environment. Kept out of the YAML file so the
 * config can be committed; validated against the proxy the config selects.
 */
export function loadSecrets(
  env: Readonly<Record<string, string | undefined>>,
  config: AppConfig,
): AppSecrets {
  const result = secretsEnvSchema.safeParse(env);
  const issues: Array<string> = result.success
    ? []
    : result.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);

  if (config.source.proxy.kind === "scrapeops" && !env["SCRAPEOPS_API_KEY"]) {
    issues.push(
      "  - SCRAPEOPS_API_KEY: required when source.proxy.kind is scrapeops",
    );
  }

  if (!result.success || issues.length > 0) {
    throw new Error(`invalid environment:\n${issues.join("\n")}`);
  }

  return {
    webhookUrl: result.data.DISCORD_WEBHOOK_URL,
    scrapeOpsApiKey: result.data.SCRAPEOPS_API_KEY ?? null,
  };
}
