/**
 * Azure Cosmos DB Paginated Query Executor
 *
 * Runs a SQL query against a collection, following `x-ms-continuation` until
 * the service stops returning one. Pages are fetched one at a time.
 */

import { z } from "zod";
import type { CosmosAuthProvider } from "../auth/index.js";
import { CosmosConfig, resourceUrl } from "../config/index.js";
import { QueryError, parseRemoteError } from "../errors.js";
import { Logger, MetricNames, MetricsCollector } from "../observability/index.js";
import { RateLimitRetrier } from "../resilience/index.js";
import {
  HttpResponse,
  HttpTransport,
  getActivityId,
  getHeader,
  getRequestCharge,
  getSessionToken,
  isSuccess,
} from "../transport/index.js";
import { buildRequestHeaders, partitionKeyHeader } from "../transport/headers.js";
import type { QueryOptions, QueryPage, QueryResult } from "../types/index.js";
import { buildQueryBody } from "./escape.js";
import { RecordAccumulator, toRecord } from "./merge.js";

/**
 * A query against one collection.
 */
export interface QueryRequest {
  /** `dbs/{db}/colls/{coll}`; the query is posted to `{endpoint}/{link}/docs`. */
  collectionLink: string;
  query: string;
  options?: QueryOptions;
}

const pageBodySchema = z.object({
  Documents: z.array(z.unknown()),
});

export class QueryExecutor {
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

  /**
   * Execute a query and merge every page into one result.
   */
  async execute(request: QueryRequest): Promise<QueryResult> {
    const log = this.logger.child({ collectionLink: request.collectionLink });
    const accumulator = new RecordAccumulator();
    let requestCharge = 0;
    let sessionToken: string | undefined;
    let continuation: string | undefined;
    let pageCount = 0;
    let retryCount = 0;

    do {
      const { page, retries } = await this.fetchPage(request, continuation);
      retryCount += retries;
      pageCount++;

      accumulator.add(page.documents);
      requestCharge += page.requestCharge;
      sessionToken = page.sessionToken ?? sessionToken;
      continuation = page.continuation;

      log.debug("Query page received", {
        page: pageCount,
        documents: page.documents.length,
        requestCharge: page.requestCharge,
        hasContinuation: continuation !== undefined,
      });
    } while (continuation);

    const { documents, fields } = accumulator.result();
    log.debug("Query completed", { pages: pageCount, documents: documents.length, requestCharge });

    return { documents, fields, requestCharge, sessionToken, pageCount, retryCount };
  }

  /**
   * Iterate over the pages of a query without merging them.
   */
  async *pages(request: QueryRequest): AsyncIterable<QueryPage> {
    let continuation: string | undefined;
    do {
      const { page } = await this.fetchPage(request, continuation);
      continuation = page.continuation;
      yield page;
    } while (continuation);
  }

  private async fetchPage(
    request: QueryRequest,
    continuation: string | undefined
  ): Promise<{ page: QueryPage; retries: number }> {
    const options = request.options ?? {};
    const url = resourceUrl(this.config.endpoint, `${request.collectionLink}/docs`);
    const body = buildQueryBody(request.query);

    const { response, retries } = await this.retrier.send(() => {
      this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, { operation: "query" });
      return this.transport.send({
        method: "POST",
        url,
        headers: this.buildHeaders(request, continuation),
        body,
        timeout: this.config.timeoutMs,
        signal: options.signal,
      });
    }, options.signal);

    if (!isSuccess(response)) {
      this.metrics.incrementCounter(MetricNames.ERRORS_TOTAL, 1, { operation: "query" });
      throw new QueryError(parseRemoteError(response.status, response.body), {
        statusCode: response.status,
        activityId: getActivityId(response),
      });
    }

    const page = this.parsePage(response);
    this.metrics.incrementCounter(MetricNames.QUERY_PAGES_TOTAL);
    this.metrics.recordHistogram(MetricNames.REQUEST_CHARGE, page.requestCharge, { operation: "query" });
    return { page, retries };
  }

  // Signed per attempt so every page and every retry carries a current date.
  private buildHeaders(request: QueryRequest, continuation: string | undefined): Record<string, string> {
    const options = request.options ?? {};
    const signed = this.authProvider.signRequest("POST", "docs", request.collectionLink);
    const crossPartition = options.enableCrossPartitionQuery ?? options.partitionKey === undefined;

    return {
      "Content-Type": "application/query+json",
      ...buildRequestHeaders(this.config, signed, options),
      "x-ms-documentdb-isquery": "True",
      "x-ms-documentdb-query-enablecrosspartition": String(crossPartition),
      "x-ms-max-item-count": String(options.maxItemCount ?? this.config.maxItemCount),
      "x-ms-continuation": continuation ?? "",
      "x-ms-documentdb-partitionkey": partitionKeyHeader(options.partitionKey),
    };
  }

  /**
   * A body without a `Documents` array contributes no records.
   */
  private parsePage(response: HttpResponse): QueryPage {
    const continuation = getHeader(response, "x-ms-continuation");
    return {
      documents: parseDocuments(response.body, this.logger).map(toRecord),
      requestCharge: getRequestCharge(response),
      sessionToken: getSessionToken(response),
      continuation: continuation ? continuation : undefined,
    };
  }
}

function parseDocuments(body: string, logger: Logger): unknown[] {
  let json: unknown;
  try {
    json = body ? JSON.parse(body) : undefined;
  } catch (error) {
    logger.warn("Query page body is not JSON; treating it as empty", {
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }

  const parsed = pageBodySchema.safeParse(json);
  if (!parsed.success) {
    logger.debug("Query page has no Documents array; treating it as empty");
    return [];
  }
  return parsed.data.Documents;
}
