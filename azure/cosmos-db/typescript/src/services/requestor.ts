/**
 * Azure Cosmos DB - Resource Requestor
 *
 * Signs, sends and decodes the single-request resource operations.
 */

import { z } from "zod";
import type { CosmosAuthProvider, HttpVerb } from "../auth/index.js";
import { CosmosConfig, resourceUrl } from "../config/index.js";
import { CosmosError, ResourceError, parseRemoteError } from "../errors.js";
import { Logger, MetricNames, MetricsCollector } from "../observability/index.js";
import { RateLimitRetrier } from "../resilience/index.js";
import {
  HttpResponse,
  HttpTransport,
  getActivityId,
  getRequestCharge,
  getSessionToken,
  isSuccess,
} from "../transport/index.js";
import { buildRequestHeaders, partitionKeyHeader } from "../transport/headers.js";
import type { PartitionedRequestOptions, ResourceResponse } from "../types/index.js";

export interface ResourceRequest {
  method: HttpVerb;
  /** Resource type the signature is computed for. */
  resourceType: string;
  /** Resource link the signature is computed over. */
  resourceLink: string;
  /** Request path relative to the account endpoint. */
  path: string;
  /** Operation name used in errors, logs and metrics. */
  operation: string;
  body?: string;
  headers?: Record<string, string>;
  options?: PartitionedRequestOptions;
  /** Non-2xx statuses returned to the caller instead of thrown. */
  acceptStatus?: readonly number[];
}

export class ResourceRequestor {
  private readonly config: CosmosConfig;
  private readonly transport: HttpTransport;
  private readonly authProvider: CosmosAuthProvider;
  private readonly retrier: RateLimitRetrier;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(
    config: CosmosConfig,
    transport: HttpTransport,
    authProvider: CosmosAuthProvider,
    retrier: RateLimitRetrier,
    logger: Logger,
    metrics: MetricsCollector
  ) {
    this.config = config;
    this.transport = transport;
    this.authProvider = authProvider;
    this.retrier = retrier;
    this.logger = logger;
    this.metrics = metrics;
  }

  getConfig(): Readonly<CosmosConfig> {
    return this.config;
  }

  /**
   * Send a request, backing off on 429. Statuses outside 2xx and
   * `acceptStatus` become ResourceError.
   */
  async send(request: ResourceRequest): Promise<HttpResponse> {
    const options = request.options ?? {};
    const url = resourceUrl(this.config.endpoint, request.path);
    const labels = { operation: request.operation };

    const { response } = await this.retrier.send(() => {
      this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, labels);
      return this.transport.send({
        method: request.method,
        url,
        headers: this.buildHeaders(request),
        body: request.body,
        timeout: this.config.timeoutMs,
        signal: options.signal,
      });
    }, options.signal);

    this.metrics.recordHistogram(MetricNames.REQUEST_CHARGE, getRequestCharge(response), labels);

    if (!isSuccess(response) && !request.acceptStatus?.includes(response.status)) {
      this.metrics.incrementCounter(MetricNames.ERRORS_TOTAL, 1, labels);
      const error = new ResourceError(parseRemoteError(response.status, response.body), {
        statusCode: response.status,
        activityId: getActivityId(response),
        operation: request.operation,
      });
      this.logger.debug("Request failed", { ...labels, status: response.status, code: error.remote.code });
      throw error;
    }

    return response;
  }

  /**
   * Send a request and decode its JSON body with `schema`.
   */
  async sendJson<S extends z.ZodTypeAny>(
    request: ResourceRequest,
    schema: S
  ): Promise<ResourceResponse<z.output<S>>> {
    const response = await this.send(request);
    return {
      resource: decodeBody(response.body, schema, request.operation),
      requestCharge: getRequestCharge(response),
      sessionToken: getSessionToken(response),
    };
  }

  /**
   * Send a request whose response body is not needed.
   */
  async sendEmpty(request: ResourceRequest): Promise<ResourceResponse<undefined>> {
    const response = await this.send(request);
    return {
      resource: undefined,
      requestCharge: getRequestCharge(response),
      sessionToken: getSessionToken(response),
    };
  }

  private buildHeaders(request: ResourceRequest): Record<string, string> {
    const options = request.options ?? {};
    const signed = this.authProvider.signRequest(request.method, request.resourceType, request.resourceLink);
    const headers: Record<string, string> = {
      ...buildRequestHeaders(this.config, signed, options),
      ...request.headers,
    };

    if (request.body !== undefined) {
      headers["Content-Type"] = headers["Content-Type"] ?? "application/json";
    }
    if (options.partitionKey !== undefined) {
      headers["x-ms-documentdb-partitionkey"] = partitionKeyHeader(options.partitionKey);
    }

    return headers;
  }
}

function decodeBody<S extends z.ZodTypeAny>(body: string, schema: S, operation: string): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new CosmosError(
      `Response of ${operation} is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      "Response.Malformed"
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new CosmosError(`Unexpected response of ${operation}: ${issues.join(", ")}`, "Response.Malformed");
  }
  return parsed.data;
}
