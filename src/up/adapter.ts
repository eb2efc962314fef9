/**
 * UP client factory: resolves credentials, opens the token store and composes
 * the OAuth client, request gateway and record decoder into one UpClient.
 */

import { DEFAULT_BASE_URL } from "../config.js";
import type { RawRecords, TypedRecords } from "../domain/types.js";
import { FetchHttpClient, type IHttpClient } from "../http/client.js";
import { type Logger, silentLogger } from "../logger.js";
import { UpOAuthClient } from "./auth.js";
import { UpClient } from "./client.js";
import { resolveCredentials } from "./credentials.js";
import { RequestGateway } from "./gateway.js";
import { RawRecordDecoder, TypedRecordDecoder } from "./record-mapper.js";
import type { OutputFormat } from "./record-mapper.js";
import { TokenStore } from "./token-store.js";

export type TypedUpClient = UpClient<TypedRecords>;
export type RawUpClient = UpClient<RawRecords>;

export interface UpClientOptions {
  /** UP API access id; read from UP_ACCESSID when not given together with secretKey */
  accessId?: string;
  secretKey?: string;
  /** Directory holding .env; defaults to the working directory */
  envDir?: string;
  /** Directory holding .token; defaults to envDir */
  tokenDir?: string;
  /** Ignore any stored token and exchange credentials on first use */
  forceNewToken?: boolean;
  /** "typed" (default) maps responses onto records, "raw" returns the parsed JSON */
  output?: OutputFormat;
  baseUrl?: string;
  timeoutMs?: number;
  /** Process environment consulted for credentials; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  http?: IHttpClient;
  logger?: Logger;
}

export function createUpClient(options: UpClientOptions & { output: "raw" }): RawUpClient;
export function createUpClient(options?: UpClientOptions & { output?: "typed" }): TypedUpClient;
export function createUpClient(options: UpClientOptions = {}): TypedUpClient | RawUpClient {
  const logger = options.logger ?? silentLogger;
  const envDir = options.envDir ?? process.cwd();
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  const http = options.http ?? new FetchHttpClient();

  const credentials = resolveCredentials({
    accessId: options.accessId,
    secretKey: options.secretKey,
    envDir,
    env: options.env,
  });
  const store = TokenStore.open(options.tokenDir ?? envDir, {
    forceNew: options.forceNewToken,
    logger,
  });
  const auth = new UpOAuthClient(
    { baseUrl, credentials, timeoutMs: options.timeoutMs, logger },
    store,
    http
  );
  const gateway = new RequestGateway({ baseUrl, timeoutMs: options.timeoutMs, logger }, auth, http);

  if (options.output === "raw") {
    return new UpClient<RawRecords>(auth, gateway, new RawRecordDecoder(), logger);
  }
  return new UpClient<TypedRecords>(auth, gateway, new TypedRecordDecoder(), logger);
}
