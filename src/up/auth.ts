/**
 * UP OAuth 2.0 client-credentials flow: token exchange, persistence and reuse.
 *
 * The OAuth service rejects frequent re-exchanges, so a token is reused for its
 * whole lifetime and a failed exchange is never retried here.
 */

import type { HttpResponse, IHttpClient } from "../http/client.js";
import { isHttpError } from "../http/client.js";
import {
  authenticationError,
  networkError,
  protocolError,
  timeoutError,
} from "../domain/errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type { Credentials } from "./credentials.js";
import type { Token, TokenStore } from "./token-store.js";

export const UP_OAUTH_PATH = "/oauth/token";

/** Lifetime the OAuth service documents for its tokens */
export const TOKEN_LIFETIME_MS = 2 * 60 * 60 * 1000;

export interface UpAuthConfig {
  baseUrl: string;
  credentials: Credentials;
  timeoutMs?: number;
  logger?: Logger;
}

export function isTokenStale(token: Token | null, now: number = Date.now()): boolean {
  if (!token) return true;
  return now > token.issuedAt.getTime() + TOKEN_LIFETIME_MS;
}

/**
 * UP OAuth client: hands out the stored token while it is fresh and exchanges
 * credentials for a new one when it is not.
 */
export class UpOAuthClient {
  private readonly logger: Logger;
  private pending: Promise<Token> | null = null;

  constructor(
    private readonly config: UpAuthConfig,
    private readonly store: TokenStore,
    private readonly http: IHttpClient
  ) {
    this.logger = (config.logger ?? silentLogger).child({ component: "auth" });
  }

  /** Returns a valid access token, exchanging credentials only when the stored one is stale. */
  async getValidToken(): Promise<string> {
    const cached = this.store.current;
    if (cached && !isTokenStale(cached)) {
      return cached.value;
    }
    const token = await this.exchangeOnce();
    return token.value;
  }

  /** Exchange credentials now, whatever the state of the stored token. */
  async refreshToken(): Promise<string> {
    const token = await this.exchangeOnce();
    return token.value;
  }

  /** Clear the stored token; the next getValidToken() exchanges credentials. */
  invalidateToken(): void {
    this.store.save(null);
  }

  private get tokenUrl(): string {
    return `${this.config.baseUrl.replace(/\/$/, "")}${UP_OAUTH_PATH}`;
  }

  /** Concurrent callers share the exchange in flight instead of starting their own. */
  private async exchangeOnce(): Promise<Token> {
    if (this.pending) {
      return this.pending;
    }
    this.pending = this.exchange();
    try {
      return await this.pending;
    } finally {
      this.pending = null;
    }
  }

  private async exchange(): Promise<Token> {
    const url = this.tokenUrl;
    const { accessId, secretKey } = this.config.credentials;
    const basic = Buffer.from(`${accessId}:${secretKey}`, "ascii").toString("base64");

    let res: HttpResponse;
    try {
      res = await this.http.send({
        method: "POST",
        url,
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: "grant_type=client_credentials",
        timeoutMs: this.config.timeoutMs,
      });
    } catch (err) {
      if (isHttpError(err) && err.code === "ETIMEDOUT") {
        throw timeoutError("UP OAuth token request", url);
      }
      throw networkError(url, err);
    }

    if (res.status !== 200) {
      this.logger.error("Token request failed", { status: res.status });
      throw authenticationError(`Token request failed. Status Code: ${res.status}`, res.status, res.body);
    }

    const token: Token = { value: parseAccessToken(res.body), issuedAt: new Date() };
    this.store.save(token);
    this.logger.info("Obtained new access token", { issuedAt: token.issuedAt.toISOString() });
    return token;
  }
}

function parseAccessToken(body: string): string {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (e) {
    throw protocolError("OAuth token response is not valid JSON", e);
  }
  if (typeof data !== "object" || data === null || !("access_token" in data)) {
    throw protocolError("Missing access_token in OAuth token response");
  }
  if (typeof data.access_token !== "string" || data.access_token === "") {
    throw protocolError("access_token in OAuth token response is not a non-empty string");
  }
  return data.access_token;
}
