import { z } from "zod";
import type { Result } from "./types/result";
import { Ok, Err } from "./utils/result";
import { ConfigurationError } from "./errors";

export const ClientConfigSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(30_000),
  headers: z.record(z.string()).default({}),
  debug: z.boolean().default(false),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

function describe(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join(", ");
}

export function parseClientConfig(
  input: ClientConfigInput,
): Result<ClientConfig, ConfigurationError> {
  const parsed = ClientConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Err(new ConfigurationError(`Invalid client config: ${describe(parsed.error)}`));
  }
  return Ok(parsed.data);
}

/**
 * Build a client config from environment variables.
 *
 * API_BASE_URL (required), API_KEY, API_TIMEOUT_MS, API_DEBUG ("true" / "1").
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Result<ClientConfig, ConfigurationError> {
  if (!env.API_BASE_URL) {
    return Err(new ConfigurationError("API_BASE_URL is not set"));
  }

  let timeoutMs: number | undefined;
  if (env.API_TIMEOUT_MS !== undefined) {
    timeoutMs = Number(env.API_TIMEOUT_MS);
    if (!Number.isInteger(timeoutMs)) {
      return Err(
        new ConfigurationError(`API_TIMEOUT_MS must be an integer, got "${env.API_TIMEOUT_MS}"`),
      );
    }
  }

  return parseClientConfig({
    baseUrl: env.API_BASE_URL,
    apiKey: env.API_KEY || undefined,
    timeoutMs,
    debug: env.API_DEBUG === "true" || env.API_DEBUG === "1",
  });
}
