import { z } from "zod";
import { InvalidConfigurationError } from "./errors.js";

export const DEFAULT_BASE_URL = "openapi.easy4ip.com";
export const DEFAULT_TIMEOUT = 10; // seconds

export const clientConfigSchema = z.object({
  appId: z.string().min(1).describe("Application id from the Imou developer console"),
  appSecret: z.string().min(1).describe("Application secret"),
  baseUrl: z
    .string()
    .min(1)
    .regex(/^[^/:]+(:\d+)?$/, "must be a host name without scheme or path")
    .default(DEFAULT_BASE_URL)
    .describe("API host (e.g. openapi.easy4ip.com)"),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT).describe("Request timeout in seconds"),
});

export type ImouClientConfig = z.infer<typeof clientConfigSchema>;
export type ImouClientConfigInput = z.input<typeof clientConfigSchema>;

export function parseConfig(input: ImouClientConfigInput): ImouClientConfig {
  const result = clientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidConfigurationError(`Invalid client configuration: ${issues.join("; ")}`);
  }
  return result.data;
}

/** Read the client configuration from `IMOU_*` environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ImouClientConfig {
  const timeout = env.IMOU_TIMEOUT ? Number(env.IMOU_TIMEOUT) : undefined;
  return parseConfig({
    appId: env.IMOU_APP_ID ?? "",
    appSecret: env.IMOU_APP_SECRET ?? "",
    baseUrl: env.IMOU_BASE_URL || undefined,
    timeout,
  });
}
