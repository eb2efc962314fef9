/**
 * Stub HTTP client for tests and the offline demo: records requests and
 * answers from a queue or from routes keyed by method and path.
 */

import type { HttpRequest, HttpResponse, IHttpClient } from "./client.js";

export type StubResponse = HttpResponse | ((request: HttpRequest) => Promise<HttpResponse>);

/** Shorthand for a JSON response */
export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return { status, headers: { "content-type": "application/json" }, body: JSON.stringify(body) };
}

export function textResponse(body: string, status: number): HttpResponse {
  return { status, headers: { "content-type": "text/plain" }, body };
}

/**
 * Routed responses (`route("GET", "/services/v2/routes", ...)`) are matched on
 * method and URL path, ignoring the query string, and answer every matching
 * request. Anything unrouted takes the next queued response.
 */
export class StubHttpClient implements IHttpClient {
  private responses: StubResponse[] = [];
  private routes = new Map<string, StubResponse>();
  private recordedRequests: HttpRequest[] = [];

  /** Set one response to return for the next request */
  setResponse(res: StubResponse): void {
    this.responses = [res];
  }

  /** Set a sequence of responses (one per request) */
  setResponses(res: StubResponse[]): void {
    this.responses = [...res];
  }

  addResponse(res: StubResponse): void {
    this.responses.push(res);
  }

  route(method: HttpRequest["method"], path: string, res: StubResponse): void {
    this.routes.set(`${method} ${path}`, res);
  }

  getRecordedRequests(): HttpRequest[] {
    return [...this.recordedRequests];
  }

  reset(): void {
    this.recordedRequests = [];
    this.responses = [];
    this.routes.clear();
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.recordedRequests.push(request);
    const routed = this.routes.get(`${request.method} ${new URL(request.url).pathname}`);
    const next = routed ?? this.responses.shift();
    if (next === undefined) {
      return textResponse(`No stub response configured for ${request.method} ${request.url}`, 599);
    }
    if (typeof next === "function") {
      return next(request);
    }
    return next;
  }
}
