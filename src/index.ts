/**
 * Union Pacific customer API client
 *
 * Public API: typed records, errors, the client factory and its building blocks.
 */

export * from "./domain/index.js";
export { createUpClient } from "./up/adapter.js";
export type { UpClientOptions, TypedUpClient, RawUpClient } from "./up/adapter.js";
export { UpClient, UP_ENDPOINTS } from "./up/client.js";
export type {
  ApiResult,
  RouteQuery,
  LocationQuery,
  ShipmentQuery,
  CaseQuery,
  WaybillQuery,
} from "./up/types.js";
export { UpOAuthClient, TOKEN_LIFETIME_MS, isTokenStale } from "./up/auth.js";
export { TokenStore, TOKEN_FILENAME } from "./up/token-store.js";
export type { Token, TokenStoreOptions } from "./up/token-store.js";
export { resolveCredentials, ENV_FILENAME } from "./up/credentials.js";
export type { Credentials, CredentialOptions } from "./up/credentials.js";
export { RequestGateway, encodeQuery } from "./up/gateway.js";
export type { QueryParams, QueryValue } from "./up/gateway.js";
export { mapJson, mapOne, mapMany, TypedRecordDecoder, RawRecordDecoder } from "./up/record-mapper.js";
export type { OutputFormat, RecordDecoder } from "./up/record-mapper.js";
export { FetchHttpClient } from "./http/client.js";
export type { IHttpClient, HttpRequest, HttpResponse } from "./http/client.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export { loadConfig, DEFAULT_BASE_URL } from "./config.js";
export type { Config } from "./config.js";
