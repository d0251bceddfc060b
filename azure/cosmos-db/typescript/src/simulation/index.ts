/**
 * Azure Cosmos DB Simulation Module
 *
 * In-process transport for tests: route handlers and a queue of canned
 * responses.
 */

import { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from "../transport/index.js";

export type MockHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

interface Route {
  method: HttpMethod;
  pattern: string | RegExp;
  handler: MockHandler;
}

/**
 * Mock transport that returns configurable responses.
 *
 * Queued responses are served first, in order. Then the first matching
 * route answers, then the default handler, then a 404.
 */
export class MockTransport implements HttpTransport {
  private routes: Route[] = [];
  private queue: HttpResponse[] = [];
  private defaultHandler?: MockHandler;
  private calls: HttpRequest[] = [];

  /**
   * Register a handler for a method and URL pattern. A string pattern
   * matches any URL containing it.
   */
  on(method: HttpMethod, urlPattern: string | RegExp, handler: MockHandler): this {
    this.routes.push({ method, pattern: urlPattern, handler });
    return this;
  }

  /**
   * Set default handler for unmatched requests.
   */
  onDefault(handler: MockHandler): this {
    this.defaultHandler = handler;
    return this;
  }

  /**
   * Queue responses returned to the next requests regardless of route.
   */
  enqueue(...responses: HttpResponse[]): this {
    this.queue.push(...responses);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.calls.push({ ...request, headers: { ...request.headers } });

    const queued = this.queue.shift();
    if (queued) {
      return queued;
    }

    for (const route of this.routes) {
      if (route.method !== request.method) continue;
      const matches =
        typeof route.pattern === "string"
          ? request.url.includes(route.pattern)
          : route.pattern.test(request.url);
      if (matches) {
        return route.handler(request);
      }
    }

    if (this.defaultHandler) {
      return this.defaultHandler(request);
    }

    return createErrorResponse(404, "NotFound", `No mock response for ${request.method} ${request.url}`);
  }

  /**
   * Get all requests that were sent.
   */
  getCalls(): HttpRequest[] {
    return [...this.calls];
  }

  /**
   * Number of queued responses not yet served.
   */
  getPendingCount(): number {
    return this.queue.length;
  }

  /**
   * Clear all handlers, queued responses and calls.
   */
  clear(): void {
    this.routes = [];
    this.queue = [];
    this.defaultHandler = undefined;
    this.calls = [];
  }
}

/**
 * JSON response helper. Header names are lower-cased as the fetch transport does.
 */
export function createJsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): HttpResponse {
  const normalized: Record<string, string> = { "content-type": "application/json" };
  for (const [key, value] of Object.entries(headers)) {
    normalized[key.toLowerCase()] = value;
  }

  return {
    status,
    statusText: status >= 200 && status < 300 ? "OK" : "Error",
    headers: normalized,
    body: body === undefined ? "" : JSON.stringify(body),
  };
}

/**
 * Error response carrying the service's `{code, message}` body.
 */
export function createErrorResponse(
  status: number,
  code: string,
  message: string,
  headers: Record<string, string> = {}
): HttpResponse {
  return createJsonResponse(status, { code, message }, headers);
}

/**
 * 429 response directing the client to wait `retryAfterMs`.
 */
export function createRateLimitedResponse(retryAfterMs: number): HttpResponse {
  return createErrorResponse(429, "TooManyRequests", "Request rate is large", {
    "x-ms-retry-after-ms": String(retryAfterMs),
  });
}

/**
 * Create a mock transport.
 */
export function createMockTransport(): MockTransport {
  return new MockTransport();
}
