/**
 * Azure Cosmos DB Configuration Module
 *
 * Builder, defaults and validation for the Cosmos DB REST client.
 */

import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { LogLevel } from "../observability/index.js";

/** REST API version sent with every request. */
export const API_VERSION = "2016-07-11";

/** Default page size hint for queries. */
export const DEFAULT_MAX_ITEM_COUNT = 100;

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 30000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = "azure-cosmos-db-rest/0.1.0";

/**
 * Consistency levels the service accepts as a per-request override.
 */
export type ConsistencyLevel =
  | "Strong"
  | "BoundedStaleness"
  | "Session"
  | "ConsistentPrefix"
  | "Eventual";

/**
 * Account credentials.
 */
export type CosmosCredentials =
  | { type: "master_key"; key: string }
  | { type: "connection_string"; connectionString: string };

/**
 * Time source used for request dates.
 */
export interface Clock {
  now(): Date;
}

/** Wall clock. */
export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Bounds on the 429 backoff loop.
 */
export interface RateLimitRetryConfig {
  /** When false the first 429 surfaces as RateLimitedError. */
  enabled: boolean;
  /** Maximum number of retries of a single request. */
  maxRetries: number;
  /** Maximum cumulative server-directed wait for a single request, in ms. */
  maxWaitTimeMs: number;
}

/**
 * Cosmos DB client configuration.
 */
export interface CosmosConfig {
  /** Account endpoint, e.g. https://myaccount.documents.azure.com */
  endpoint: string;
  credentials: CosmosCredentials;
  /** Default database for collection and document operations. */
  databaseId?: string;
  /** Default collection for document and throughput operations. */
  collectionId?: string;
  userAgent: string;
  /** Consistency override applied when a call does not set one. */
  consistencyLevel?: ConsistencyLevel;
  /** Page size hint for queries. */
  maxItemCount: number;
  timeoutMs: number;
  rateLimitRetry: RateLimitRetryConfig;
  enableLogging: boolean;
  logLevel: LogLevel;
  clock: Clock;
}

/**
 * Default 429 policy.
 */
export const DEFAULT_RATE_LIMIT_RETRY_CONFIG: RateLimitRetryConfig = {
  enabled: true,
  maxRetries: 9,
  maxWaitTimeMs: 30000,
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<CosmosConfig, "endpoint" | "credentials"> = {
  userAgent: DEFAULT_USER_AGENT,
  maxItemCount: DEFAULT_MAX_ITEM_COUNT,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  rateLimitRetry: DEFAULT_RATE_LIMIT_RETRY_CONFIG,
  enableLogging: false,
  logLevel: "info",
  clock: systemClock,
};

const configSchema = z.object({
  endpoint: z.string().url(),
  userAgent: z.string(),
  maxItemCount: z.number().int().min(-1),
  timeoutMs: z.number().int().positive(),
  rateLimitRetry: z.object({
    enabled: z.boolean(),
    maxRetries: z.number().int().nonnegative(),
    maxWaitTimeMs: z.number().nonnegative(),
  }),
  consistencyLevel: z
    .enum(["Strong", "BoundedStaleness", "Session", "ConsistentPrefix", "Eventual"])
    .optional(),
});

/**
 * Split an account connection string into its key/value parts.
 */
export function parseConnectionString(connectionString: string): Map<string, string> {
  const parts = new Map<string, string>();

  for (const part of connectionString.split(";")) {
    const [key, ...valueParts] = part.split("=");
    if (key && valueParts.length > 0) {
      parts.set(key.trim(), valueParts.join("="));
    }
  }

  return parts;
}

/**
 * Cosmos DB configuration builder.
 */
export class CosmosConfigBuilder {
  private config: Partial<CosmosConfig> = {};

  /**
   * Set the account endpoint.
   */
  endpoint(url: string): this {
    this.config.endpoint = url;
    return this;
  }

  /**
   * Set explicit credentials.
   */
  credentials(credentials: CosmosCredentials): this {
    this.config.credentials = credentials;
    return this;
  }

  /**
   * Use a primary or secondary master key.
   */
  masterKey(key: string): this {
    this.config.credentials = { type: "master_key", key };
    return this;
  }

  /**
   * Use an account connection string. The endpoint is taken from it unless
   * one was set explicitly.
   */
  connectionString(connectionString: string): this {
    this.config.credentials = { type: "connection_string", connectionString };
    const accountEndpoint = parseConnectionString(connectionString).get("AccountEndpoint");
    if (accountEndpoint && !this.config.endpoint) {
      this.config.endpoint = accountEndpoint;
    }
    return this;
  }

  database(databaseId: string): this {
    this.config.databaseId = databaseId;
    return this;
  }

  collection(collectionId: string): this {
    this.config.collectionId = collectionId;
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  consistencyLevel(level: ConsistencyLevel): this {
    this.config.consistencyLevel = level;
    return this;
  }

  maxItemCount(count: number): this {
    this.config.maxItemCount = count;
    return this;
  }

  timeout(ms: number): this {
    this.config.timeoutMs = ms;
    return this;
  }

  /**
   * Override parts of the 429 backoff policy.
   */
  rateLimitRetry(config: Partial<RateLimitRetryConfig>): this {
    this.config.rateLimitRetry = {
      ...(this.config.rateLimitRetry ?? DEFAULT_RATE_LIMIT_RETRY_CONFIG),
      ...config,
    };
    return this;
  }

  enableLogging(enable: boolean = true): this {
    this.config.enableLogging = enable;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Inject the time source used for request dates.
   */
  clock(clock: Clock): this {
    this.config.clock = clock;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const connectionString = env.COSMOS_CONNECTION_STRING;
    if (connectionString) {
      this.connectionString(connectionString);
    }

    const endpoint = env.COSMOS_ENDPOINT;
    if (endpoint) {
      this.config.endpoint = endpoint;
    }

    const key = env.COSMOS_KEY;
    if (key) {
      this.config.credentials = { type: "master_key", key };
    }

    if (env.COSMOS_DATABASE) {
      this.config.databaseId = env.COSMOS_DATABASE;
    }
    if (env.COSMOS_COLLECTION) {
      this.config.collectionId = env.COSMOS_COLLECTION;
    }
    if (env.COSMOS_USER_AGENT) {
      this.config.userAgent = env.COSMOS_USER_AGENT;
    }

    return this;
  }

  /**
   * Build the configuration.
   */
  build(): CosmosConfig {
    const { endpoint, credentials } = this.config;

    if (!endpoint) {
      throw new ConfigurationError(
        "Endpoint must be specified (set COSMOS_ENDPOINT or call endpoint())",
        "InvalidEndpoint"
      );
    }

    if (!credentials) {
      throw new ConfigurationError(
        "Credentials must be specified (set COSMOS_KEY, COSMOS_CONNECTION_STRING, or call masterKey())",
        "MissingCredentials"
      );
    }

    const merged: CosmosConfig = { ...DEFAULT_CONFIG, ...this.config, endpoint, credentials };

    const result = configSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join(", ")}`, "InvalidConfig");
    }

    return { ...merged, endpoint: endpoint.replace(/\/+$/, "") };
  }
}

/**
 * Create a new Cosmos DB config builder.
 */
export function configBuilder(): CosmosConfigBuilder {
  return new CosmosConfigBuilder();
}

export function databaseLink(databaseId: string): string {
  return `dbs/${databaseId}`;
}

export function collectionLink(databaseId: string, collectionId: string): string {
  return `${databaseLink(databaseId)}/colls/${collectionId}`;
}

export function documentLink(databaseId: string, collectionId: string, documentId: string): string {
  return `${collectionLink(databaseId, collectionId)}/docs/${documentId}`;
}

export function offerLink(offerId: string): string {
  return `offers/${offerId}`;
}

/**
 * Build a request URL from the account endpoint and a resource path. Each
 * segment is URL-encoded; the signature is computed over the raw path.
 */
export function resourceUrl(endpoint: string, path: string): string {
  const encoded = path
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join("/");
  return `${endpoint.replace(/\/+$/, "")}/${encoded}`;
}

/**
 * Resolve the default database, failing when neither the call nor the
 * configuration names one.
 */
export function requireDatabase(config: CosmosConfig, databaseId?: string): string {
  const resolved = databaseId || config.databaseId;
  if (!resolved) {
    throw new ConfigurationError(
      "Database must be specified (set COSMOS_DATABASE, call database(), or pass databaseId)",
      "MissingDatabase"
    );
  }
  return resolved;
}

/**
 * Resolve the default collection, failing when neither the call nor the
 * configuration names one.
 */
export function requireCollection(config: CosmosConfig, collectionId?: string): string {
  const resolved = collectionId || config.collectionId;
  if (!resolved) {
    throw new ConfigurationError(
      "Collection must be specified (set COSMOS_COLLECTION, call collection(), or pass collectionId)",
      "MissingCollection"
    );
  }
  return resolved;
}
