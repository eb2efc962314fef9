/**
 * Request gateway: builds UP API URLs and performs authenticated GETs.
 * Non-2xx answers become TransportError; nothing is retried.
 */

import type { HttpResponse, IHttpClient } from "../http/client.js";
import { isHttpError } from "../http/client.js";
import { networkError, protocolError, timeoutError, transportError } from "../domain/errors.js";
import type { JsonValue } from "../domain/types.js";
import { type Logger, silentLogger } from "../logger.js";
import type { UpOAuthClient } from "./auth.js";

export type QueryValue = string | number | boolean | readonly string[] | null | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface GatewayConfig {
  baseUrl: string;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Query string for `params`: null/undefined values and empty lists are left
 * out, lists are comma-joined under a single key, insertion order is kept.
 */
export function encodeQuery(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    if (typeof value === "object") {
      if (value.length === 0) continue;
      search.append(key, value.join(","));
    } else {
      search.append(key, String(value));
    }
  }
  return search.toString();
}

/** RFC 3339 UTC instant without fractional seconds, as the API expects in the Date header */
export function requestDate(now: Date = new Date()): string {
  return `${now.toISOString().slice(0, 19)}Z`;
}

function isSuccess(res: HttpResponse): boolean {
  return res.status >= 200 && res.status < 300;
}

export class RequestGateway {
  private readonly logger: Logger;

  constructor(
    private readonly config: GatewayConfig,
    private readonly auth: UpOAuthClient,
    private readonly http: IHttpClient
  ) {
    this.logger = (config.logger ?? silentLogger).child({ component: "gateway" });
  }

  buildUrl(path: string, params?: QueryParams): string {
    const base = `${this.config.baseUrl.replace(/\/$/, "")}${path}`;
    const query = params ? encodeQuery(params) : "";
    return query ? `${base}?${query}` : base;
  }

  /** GET `path` with a bearer token and return the parsed JSON body. */
  async get(path: string, params?: QueryParams): Promise<JsonValue> {
    const url = this.buildUrl(path, params);
    const token = await this.auth.getValidToken();

    let res: HttpResponse;
    try {
      res = await this.http.send({
        method: "GET",
        url,
        headers: {
          Authorization: `Bearer ${token}`,
          Date: requestDate(),
        },
        timeoutMs: this.config.timeoutMs,
      });
    } catch (err) {
      if (isHttpError(err) && err.code === "ETIMEDOUT") {
        throw timeoutError(`GET ${path}`, url);
      }
      throw networkError(url, err);
    }

    if (!isSuccess(res)) {
      if (res.status === 401 || res.status === 403) {
        // Stored token was rejected; drop it so the next call exchanges again.
        this.auth.invalidateToken();
      }
      this.logger.warn("Unexpected response from UP API", { url, status: res.status });
      throw transportError(url, res.status, res.body);
    }

    try {
      const data: JsonValue = JSON.parse(res.body);
      return data;
    } catch (e) {
      throw protocolError(`Response from ${url} is not valid JSON`, e);
    }
  }
}
