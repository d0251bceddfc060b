/**
 * Azure Cosmos DB Resilience Module
 *
 * Server-directed backoff for HTTP 429 responses. This is the only retry the
 * client performs; it is bounded by {@link RateLimitRetryConfig}.
 */

import { RateLimitRetryConfig } from "../config/index.js";
import { RateLimitedError, cancelledError } from "../errors.js";
import { Logger, MetricNames, MetricsCollector, createNoopLogger, createNoopMetricsCollector } from "../observability/index.js";
import { HttpResponse, getActivityId, getRetryAfterMs } from "../transport/index.js";

export const TOO_MANY_REQUESTS = 429;

/**
 * Suspends the caller for the given duration. Rejects with CancelledError
 * when the signal aborts first.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Fail with CancelledError if the signal has aborted.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelledError(signal);
  }
}

/**
 * Per-request retry budget.
 */
export class RateLimitBudget {
  private readonly config: RateLimitRetryConfig;
  private retries = 0;
  private waitedMs = 0;

  constructor(config: RateLimitRetryConfig) {
    this.config = config;
  }

  /**
   * Consume one retry of `delayMs`. Returns false when the budget does not
   * allow it.
   */
  tryConsume(delayMs: number): boolean {
    if (!this.config.enabled) return false;
    if (this.retries >= this.config.maxRetries) return false;
    if (this.waitedMs + delayMs > this.config.maxWaitTimeMs) return false;

    this.retries++;
    this.waitedMs += delayMs;
    return true;
  }

  get retryCount(): number {
    return this.retries;
  }

  get totalWaitMs(): number {
    return this.waitedMs;
  }
}

export interface RateLimitedSendResult {
  response: HttpResponse;
  /** Number of 429 responses that were retried. */
  retries: number;
}

/**
 * Re-issues a request while the service answers 429, sleeping for the
 * duration of `x-ms-retry-after-ms` between attempts. `attempt` is invoked
 * anew each time so the request can be re-signed.
 */
export class RateLimitRetrier {
  private readonly config: RateLimitRetryConfig;
  private readonly sleepFn: Sleep;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(
    config: RateLimitRetryConfig,
    options: { sleep?: Sleep; logger?: Logger; metrics?: MetricsCollector } = {}
  ) {
    this.config = config;
    this.sleepFn = options.sleep ?? sleep;
    this.logger = options.logger ?? createNoopLogger();
    this.metrics = options.metrics ?? createNoopMetricsCollector();
  }

  async send(
    attempt: () => Promise<HttpResponse>,
    signal?: AbortSignal
  ): Promise<RateLimitedSendResult> {
    const budget = new RateLimitBudget(this.config);

    for (;;) {
      throwIfCancelled(signal);
      const response = await attempt();

      if (response.status !== TOO_MANY_REQUESTS) {
        return { response, retries: budget.retryCount };
      }

      const retryAfterMs = getRetryAfterMs(response);
      const delayMs = retryAfterMs ?? 0;
      this.metrics.incrementCounter(MetricNames.RATE_LIMITED_TOTAL);

      if (!budget.tryConsume(delayMs)) {
        this.logger.warn("Rate limit retry budget exhausted", {
          retries: budget.retryCount,
          waitedMs: budget.totalWaitMs,
        });
        throw new RateLimitedError(budget.retryCount + 1, retryAfterMs, getActivityId(response));
      }

      this.logger.warn("Request rate limited, backing off", {
        retryAfterMs: delayMs,
        retry: budget.retryCount,
      });

      if (delayMs > 0) {
        await this.sleepFn(delayMs, signal);
      }
    }
  }
}

/**
 * Create a rate-limit retrier.
 */
export function createRateLimitRetrier(
  config: RateLimitRetryConfig,
  options?: { sleep?: Sleep; logger?: Logger; metrics?: MetricsCollector }
): RateLimitRetrier {
  return new RateLimitRetrier(config, options);
}
