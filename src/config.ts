/**
 * Configuration loaded from environment variables.
 * Credentials are not part of it: resolveCredentials reads them from the environment or .env.
 */

import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";

export const DEFAULT_BASE_URL = "https://customer.api.up.com";

const configSchema = z.object({
  UP_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  /** Directory holding .env and .token; defaults to the working directory */
  UP_ENV_DIR: z.string().min(1).optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type Config = z.infer<typeof configSchema>;

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/** Load and validate config from process.env; throws ZodError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    UP_BASE_URL: blankToUndefined(env.UP_BASE_URL),
    UP_ENV_DIR: blankToUndefined(env.UP_ENV_DIR),
    HTTP_TIMEOUT_MS: blankToUndefined(env.HTTP_TIMEOUT_MS),
    LOG_LEVEL: blankToUndefined(env.LOG_LEVEL)?.toLowerCase(),
  };
  return configSchema.parse(raw);
}
