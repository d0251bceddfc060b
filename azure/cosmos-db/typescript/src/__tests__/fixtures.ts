/**
 * Shared test fixtures.
 */

import { Clock, RateLimitRetryConfig } from "../config/index.js";
import { CosmosClient, MOCK_ENDPOINT, MOCK_MASTER_KEY, createClient } from "../client/index.js";
import { Logger, MetricsCollector } from "../observability/index.js";
import { Sleep } from "../resilience/index.js";
import { HttpResponse } from "../transport/index.js";
import { MockTransport, createJsonResponse } from "../simulation/index.js";

export const TEST_KEY = MOCK_MASTER_KEY;

export function fixedClock(date: Date): Clock {
  return { now: () => date };
}

/** Thu, 27 Apr 2017 00:51:12 GMT */
export const APRIL_2017 = new Date(Date.UTC(2017, 3, 27, 0, 51, 12));

/** Wed, 01 Jan 2020 00:00:00 GMT */
export const JANUARY_2020 = new Date(Date.UTC(2020, 0, 1, 0, 0, 0));

export const immediateSleep: Sleep = async () => undefined;

export interface TestClientOptions {
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
  metrics?: MetricsCollector;
  rateLimitRetry?: Partial<RateLimitRetryConfig>;
}

/**
 * Client against the mock endpoint with `testdb`/`testcoll` defaults.
 */
export function createTestClient(transport: MockTransport, options: TestClientOptions = {}): CosmosClient {
  const builder = createClient()
    .endpoint(MOCK_ENDPOINT)
    .masterKey(TEST_KEY)
    .database("testdb")
    .collection("testcoll")
    .clock(options.clock ?? fixedClock(JANUARY_2020))
    .sleep(options.sleep ?? immediateSleep)
    .transport(transport);

  if (options.logger) builder.logger(options.logger);
  if (options.metrics) builder.metrics(options.metrics);
  if (options.rateLimitRetry) builder.rateLimitRetry(options.rateLimitRetry);

  return builder.build();
}

/**
 * One query result page.
 */
export function page(
  documents: unknown[],
  options: { charge?: string; continuation?: string; session?: string } = {}
): HttpResponse {
  const headers: Record<string, string> = {};
  if (options.charge !== undefined) headers["x-ms-request-charge"] = options.charge;
  if (options.continuation !== undefined) headers["x-ms-continuation"] = options.continuation;
  if (options.session !== undefined) headers["x-ms-session-token"] = options.session;
  return createJsonResponse(200, { _rid: "cRid==", Documents: documents, _count: documents.length }, headers);
}

/**
 * Header of the n-th recorded call.
 */
export function headerOf(transport: MockTransport, index: number, name: string): string | undefined {
  return transport.getCalls()[index]?.headers[name];
}
