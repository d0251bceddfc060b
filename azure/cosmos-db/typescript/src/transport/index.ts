/**
 * Azure Cosmos DB HTTP Transport
 */

import { NetworkError, cancelledError } from "../errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * HTTP response. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP transport abstraction.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Transport backed by the global fetch.
 */
export class FetchTransport implements HttpTransport {
  private readonly defaultTimeout: number;

  constructor(defaultTimeout: number = 30000) {
    this.defaultTimeout = defaultTimeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw cancelledError(request.signal);
    }
    const timeout = request.timeout ?? this.defaultTimeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      if (request.signal?.aborted) {
        throw cancelledError(request.signal);
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new NetworkError(`Request timeout after ${timeout}ms`, "Timeout");
      }
      if (error instanceof TypeError) {
        throw new NetworkError(`Connection to ${request.url} failed: ${error.message}`, "ConnectionFailed");
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}

/**
 * Check if response status indicates success.
 */
export function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Get a header value case-insensitively.
 */
export function getHeader(response: HttpResponse, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
}

/**
 * Request charge of a response, 0 when the header is absent or malformed.
 */
export function getRequestCharge(response: HttpResponse): number {
  const charge = Number.parseFloat(getHeader(response, "x-ms-request-charge") ?? "");
  return Number.isFinite(charge) && charge >= 0 ? charge : 0;
}

export function getSessionToken(response: HttpResponse): string | undefined {
  return getHeader(response, "x-ms-session-token");
}

export function getActivityId(response: HttpResponse): string | undefined {
  return getHeader(response, "x-ms-activity-id");
}

/**
 * Server-directed wait of a 429 response in milliseconds.
 */
export function getRetryAfterMs(response: HttpResponse): number | undefined {
  const value = Number.parseFloat(getHeader(response, "x-ms-retry-after-ms") ?? "");
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}
