/**
 * Resolves the UP API identity (access id + secret key) once per client.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { configurationError } from "../domain/errors.js";

export const ENV_FILENAME = ".env";

export interface Credentials {
  readonly accessId: string;
  readonly secretKey: string;
}

export interface CredentialOptions {
  accessId?: string;
  secretKey?: string;
  /** Directory holding the .env file; defaults to the working directory */
  envDir?: string;
  /** Process environment; wins over values in the .env file */
  env?: NodeJS.ProcessEnv;
}

/** The ACCESS_ID and SECRET_KEY entries, stored as UP_ACCESSID and UP_SECRET_KEY */
const credentialSchema = z.object({
  UP_ACCESSID: z.string().min(1),
  UP_SECRET_KEY: z.string().min(1),
});

function readEnvFile(file: string): Record<string, string> {
  if (!fs.existsSync(file)) return {};
  return dotenv.parse(fs.readFileSync(file));
}

function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

/**
 * Explicit id and secret are used as given and nothing else is read.
 * Otherwise UP_ACCESSID and UP_SECRET_KEY must be set, in the environment
 * or in `{envDir}/.env`.
 */
export function resolveCredentials(options: CredentialOptions = {}): Credentials {
  if (options.accessId && options.secretKey) {
    return Object.freeze({ accessId: options.accessId, secretKey: options.secretKey });
  }

  const envPath = path.join(options.envDir ?? process.cwd(), ENV_FILENAME);
  const source = { ...readEnvFile(envPath), ...definedEntries(options.env ?? process.env) };
  const parsed = credentialSchema.safeParse(source);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw configurationError(
      `Unable to find UP credentials (${missing}). Set UP_ACCESSID and UP_SECRET_KEY in ${envPath} ` +
        "or the environment, or pass accessId and secretKey to the client.",
      parsed.error
    );
  }
  return Object.freeze({
    accessId: parsed.data.UP_ACCESSID,
    secretKey: parsed.data.UP_SECRET_KEY,
  });
}
