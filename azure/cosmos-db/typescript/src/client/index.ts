/**
 * Azure Cosmos DB Client Module
 *
 * Client facade over the database, collection, document and offer services.
 */

import {
  Clock,
  ConsistencyLevel,
  CosmosConfig,
  CosmosConfigBuilder,
  RateLimitRetryConfig,
  configBuilder,
} from "../config/index.js";
import { CosmosAuthProvider, createAuthProvider } from "../auth/index.js";
import { HttpTransport, FetchTransport } from "../transport/index.js";
import { QueryExecutor } from "../query/executor.js";
import { ResourceRequestor } from "../services/requestor.js";
import { DatabaseService } from "../services/databases.js";
import { CollectionService } from "../services/collections.js";
import { DocumentService } from "../services/documents.js";
import { OfferService } from "../services/offers.js";
import { RateLimitRetrier, Sleep, createRateLimitRetrier } from "../resilience/index.js";
import {
  LogLevel,
  Logger,
  MetricsCollector,
  createConsoleLogger,
  createNoopLogger,
  createNoopMetricsCollector,
} from "../observability/index.js";
import { MockTransport, createMockTransport } from "../simulation/index.js";

/**
 * Cosmos DB client options.
 */
export interface CosmosClientOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Custom HTTP transport (for testing). */
  transport?: HttpTransport;
  /** Replaces the timer used between rate-limited attempts. */
  sleep?: Sleep;
}

/**
 * Cosmos DB client facade.
 */
export class CosmosClient {
  private readonly config: CosmosConfig;
  private readonly transport: HttpTransport;
  private readonly authProvider: CosmosAuthProvider;
  private readonly retrier: RateLimitRetrier;
  private readonly requestor: ResourceRequestor;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  // Lazy-initialized services
  private _queryExecutor?: QueryExecutor;
  private _databaseService?: DatabaseService;
  private _collectionService?: CollectionService;
  private _documentService?: DocumentService;
  private _offerService?: OfferService;

  constructor(config: CosmosConfig, options: CosmosClientOptions = {}) {
    this.config = config;
    this.transport = options.transport ?? new FetchTransport(config.timeoutMs);
    this.authProvider = createAuthProvider(config.credentials, config.clock);

    this.logger =
      options.logger ?? (config.enableLogging ? createConsoleLogger(config.logLevel) : createNoopLogger());
    this.metrics = options.metrics ?? createNoopMetricsCollector();

    this.retrier = createRateLimitRetrier(config.rateLimitRetry, {
      sleep: options.sleep,
      logger: this.logger,
      metrics: this.metrics,
    });
    this.requestor = new ResourceRequestor(
      config,
      this.transport,
      this.authProvider,
      this.retrier,
      this.logger,
      this.metrics
    );

    this.logger.info("Cosmos DB client initialized", {
      endpoint: config.endpoint,
      databaseId: config.databaseId,
      collectionId: config.collectionId,
    });
  }

  /**
   * Get the paginated query executor.
   */
  queryExecutor(): QueryExecutor {
    if (!this._queryExecutor) {
      this._queryExecutor = new QueryExecutor(
        this.config,
        this.transport,
        this.authProvider,
        this.retrier,
        this.logger,
        this.metrics
      );
    }
    return this._queryExecutor;
  }

  databases(): DatabaseService {
    if (!this._databaseService) {
      this._databaseService = new DatabaseService(this.requestor);
    }
    return this._databaseService;
  }

  collections(): CollectionService {
    if (!this._collectionService) {
      this._collectionService = new CollectionService(this.requestor);
    }
    return this._collectionService;
  }

  documents(): DocumentService {
    if (!this._documentService) {
      this._documentService = new DocumentService(this.requestor, this.queryExecutor());
    }
    return this._documentService;
  }

  offers(): OfferService {
    if (!this._offerService) {
      this._offerService = new OfferService(this.requestor, this.collections());
    }
    return this._offerService;
  }

  /**
   * Get the client configuration.
   */
  getConfig(): Readonly<CosmosConfig> {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }
}

/**
 * Cosmos DB client builder.
 */
export class CosmosClientBuilder {
  private configBuilder: CosmosConfigBuilder;
  private options: CosmosClientOptions = {};

  constructor() {
    this.configBuilder = configBuilder();
  }

  endpoint(url: string): this {
    this.configBuilder.endpoint(url);
    return this;
  }

  masterKey(key: string): this {
    this.configBuilder.masterKey(key);
    return this;
  }

  connectionString(connectionString: string): this {
    this.configBuilder.connectionString(connectionString);
    return this;
  }

  database(databaseId: string): this {
    this.configBuilder.database(databaseId);
    return this;
  }

  collection(collectionId: string): this {
    this.configBuilder.collection(collectionId);
    return this;
  }

  userAgent(userAgent: string): this {
    this.configBuilder.userAgent(userAgent);
    return this;
  }

  consistencyLevel(level: ConsistencyLevel): this {
    this.configBuilder.consistencyLevel(level);
    return this;
  }

  maxItemCount(count: number): this {
    this.configBuilder.maxItemCount(count);
    return this;
  }

  timeout(ms: number): this {
    this.configBuilder.timeout(ms);
    return this;
  }

  rateLimitRetry(config: Partial<RateLimitRetryConfig>): this {
    this.configBuilder.rateLimitRetry(config);
    return this;
  }

  clock(clock: Clock): this {
    this.configBuilder.clock(clock);
    return this;
  }

  /**
   * Enable console logging at the given level.
   */
  enableLogging(enable: boolean = true, level?: LogLevel): this {
    this.configBuilder.enableLogging(enable);
    if (level) {
      this.configBuilder.logLevel(level);
    }
    return this;
  }

  /**
   * Set a custom logger.
   */
  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Set a custom metrics collector.
   */
  metrics(metrics: MetricsCollector): this {
    this.options.metrics = metrics;
    return this;
  }

  /**
   * Set a custom HTTP transport.
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  sleep(sleep: Sleep): this {
    this.options.sleep = sleep;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env?: NodeJS.ProcessEnv): this {
    this.configBuilder.fromEnv(env);
    return this;
  }

  /**
   * Build the client.
   */
  build(): CosmosClient {
    return new CosmosClient(this.configBuilder.build(), this.options);
  }
}

/** Placeholder master key of mock clients: base64 of "test-secret-signing-key". */
export const MOCK_MASTER_KEY = "dGVzdC1zZWNyZXQtc2lnbmluZy1rZXk=";

export const MOCK_ENDPOINT = "https://test-account.documents.azure.com";

/**
 * Mock Cosmos DB client for testing. Rate-limit waits resolve immediately.
 */
export class MockCosmosClient {
  private mockTransport: MockTransport;
  private client: CosmosClient;

  constructor(options: Omit<CosmosClientOptions, "transport"> & { clock?: Clock } = {}) {
    this.mockTransport = createMockTransport();

    const builder = configBuilder()
      .endpoint(MOCK_ENDPOINT)
      .masterKey(MOCK_MASTER_KEY)
      .database("testdb")
      .collection("testcoll");
    if (options.clock) {
      builder.clock(options.clock);
    }

    this.client = new CosmosClient(builder.build(), {
      logger: options.logger,
      metrics: options.metrics,
      sleep: options.sleep ?? (async () => undefined),
      transport: this.mockTransport,
    });
  }

  /**
   * Get the mock transport for setting up handlers.
   */
  getMockTransport(): MockTransport {
    return this.mockTransport;
  }

  /**
   * Get the underlying client.
   */
  getClient(): CosmosClient {
    return this.client;
  }

  databases(): DatabaseService {
    return this.client.databases();
  }

  collections(): CollectionService {
    return this.client.collections();
  }

  documents(): DocumentService {
    return this.client.documents();
  }

  offers(): OfferService {
    return this.client.offers();
  }

  queryExecutor(): QueryExecutor {
    return this.client.queryExecutor();
  }
}

/**
 * Create a new Cosmos DB client builder.
 */
export function createClient(): CosmosClientBuilder {
  return new CosmosClientBuilder();
}

/**
 * Create a mock client for testing.
 */
export function createMockClient(
  options?: Omit<CosmosClientOptions, "transport"> & { clock?: Clock }
): MockCosmosClient {
  return new MockCosmosClient(options);
}
