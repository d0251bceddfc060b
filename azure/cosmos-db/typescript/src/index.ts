/**
 * Azure Cosmos DB REST Integration
 *
 * A TypeScript client for the Cosmos DB SQL (document) REST API. Signs
 * requests with the account master key, follows query continuations and
 * backs off on 429 responses.
 *
 * @example
 * ```typescript
 * import { createClient } from "@cosmos-rest/azure-cosmos-db";
 *
 * // COSMOS_ENDPOINT, COSMOS_KEY, COSMOS_DATABASE, COSMOS_COLLECTION
 * const client = createClient().fromEnv().build();
 *
 * const result = await client.documents().query("SELECT c.id, c.total FROM c WHERE c.total > 10");
 * console.log(result.documents.length, result.requestCharge);
 *
 * await client.documents().upsert({ id: "order-1", total: 12 }, { partitionKey: "order-1" });
 * await client.offers().setCollectionThroughput(1000);
 * ```
 */

// Client
export {
  CosmosClient,
  CosmosClientBuilder,
  MockCosmosClient,
  createClient,
  createMockClient,
  MOCK_ENDPOINT,
  MOCK_MASTER_KEY,
  type CosmosClientOptions,
} from "./client/index.js";

// Configuration
export {
  CosmosConfigBuilder,
  configBuilder,
  parseConnectionString,
  databaseLink,
  collectionLink,
  documentLink,
  offerLink,
  resourceUrl,
  requireDatabase,
  requireCollection,
  systemClock,
  API_VERSION,
  DEFAULT_MAX_ITEM_COUNT,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  DEFAULT_RATE_LIMIT_RETRY_CONFIG,
  DEFAULT_CONFIG,
  type Clock,
  type ConsistencyLevel,
  type CosmosConfig,
  type CosmosCredentials,
  type RateLimitRetryConfig,
} from "./config/index.js";

// Authentication
export {
  MasterKeyAuthProvider,
  createAuthProvider,
  createMasterKeyAuth,
  generateAuthToken,
  decodeMasterKey,
  encodeReserved,
  MASTER_KEY_TYPE,
  TOKEN_VERSION,
  type CosmosAuthProvider,
  type HttpVerb,
  type SigningRequest,
} from "./auth/index.js";

// Query
export {
  QueryExecutor,
  RecordAccumulator,
  mergeRecords,
  toRecord,
  escapeTextForJson,
  buildQueryBody,
  UNNAMED_FIELD,
  type QueryRequest,
} from "./query/index.js";

// Services
export {
  ResourceRequestor,
  DatabaseService,
  CollectionService,
  DocumentService,
  OfferService,
  validateThroughput,
  DELETE_BATCH_SIZE,
  MIN_THROUGHPUT,
  SINGLE_PARTITION_MAX_THROUGHPUT,
  THROUGHPUT_STEP,
  type ResourceRequest,
  type CollectionRequestOptions,
  type CreateCollectionOptions,
  type CollectionTarget,
  type DocumentRequestOptions,
  type DocumentQueryOptions,
  type UpsertManyOptions,
  type PredicateOptions,
} from "./services/index.js";

// Resilience
export {
  RateLimitRetrier,
  RateLimitBudget,
  createRateLimitRetrier,
  sleep,
  throwIfCancelled,
  TOO_MANY_REQUESTS,
  type Sleep,
  type RateLimitedSendResult,
} from "./resilience/index.js";

// Transport
export {
  FetchTransport,
  isSuccess,
  getHeader,
  getRequestCharge,
  getSessionToken,
  getActivityId,
  getRetryAfterMs,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from "./transport/index.js";
export { buildRequestHeaders, partitionKeyHeader } from "./transport/headers.js";

// Observability
export {
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  MetricNames,
  createConsoleLogger,
  createNoopLogger,
  createInMemoryLogger,
  createNoopMetricsCollector,
  createInMemoryMetricsCollector,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type Logger,
  type MetricsCollector,
} from "./observability/index.js";

// Simulation
export {
  MockTransport,
  createMockTransport,
  createJsonResponse,
  createErrorResponse,
  createRateLimitedResponse,
  type MockHandler,
} from "./simulation/index.js";

// Errors
export {
  CosmosError,
  ConfigurationError,
  AuthenticationError,
  ResourceError,
  QueryError,
  RateLimitedError,
  CancelledError,
  NetworkError,
  ValidationError,
  parseRemoteError,
  isCosmosError,
  isRetryable,
  type RemoteError,
} from "./errors.js";

// Types
export {
  databaseSchema,
  collectionSchema,
  offerSchema,
  indexingPolicySchema,
  documentSchema,
  type DocumentRecord,
  type PartitionKeyValue,
  type RequestOptions,
  type PartitionedRequestOptions,
  type QueryOptions,
  type QueryPage,
  type QueryResult,
  type ResourceResponse,
  type OperationResult,
  type DatabaseInfo,
  type CollectionInfo,
  type IndexingPolicy,
  type OfferInfo,
} from "./types/index.js";
