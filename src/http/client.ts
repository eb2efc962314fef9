/**
 * HTTP client abstraction. Allows stubbing in tests without touching the UP client.
 */

export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface HttpError extends Error {
  readonly request: HttpRequest;
  readonly code: "ETIMEDOUT" | "ENETWORK";
}

/**
 * Minimal HTTP client interface. Default implementation uses global fetch.
 * Tests inject a stub that returns controlled responses.
 */
export interface IHttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export function isHttpError(e: unknown): e is HttpError {
  return e instanceof Error && "code" in e && "request" in e;
}

function httpError(message: string, request: HttpRequest, code: HttpError["code"], cause: unknown): HttpError {
  return Object.assign(new Error(message, { cause }), { request, code });
}

/**
 * Default implementation using fetch with timeout.
 * Every failure to get a response becomes an HttpError.
 */
export class FetchHttpClient implements IHttpClient {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs ?? 30_000);
    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: { Accept: "application/json", ...request.headers },
        body: request.body,
        signal: controller.signal,
      });
      const body = await res.text();
      const headers: Record<string, string> = {};
      res.headers.forEach((v, k) => (headers[k] = v));
      return { status: res.status, headers, body };
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw httpError(`Request timed out: ${request.url}`, request, "ETIMEDOUT", err);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw httpError(`Request failed: ${request.url}: ${reason}`, request, "ENETWORK", err);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
