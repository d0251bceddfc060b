/**
 * Azure Cosmos DB Error Types
 *
 * Error hierarchy for the Cosmos DB REST integration. Remote failures are
 * decoded once at the HTTP boundary into a {@link RemoteError}.
 */

import { z } from "zod";

/**
 * Structured error body returned by the service.
 */
export interface RemoteError {
  code: string;
  message: string;
}

const remoteErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});

/**
 * Base Cosmos DB error class.
 */
export class CosmosError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly activityId?: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { statusCode?: number; activityId?: string; retryable?: boolean }
  ) {
    super(message);
    this.name = "CosmosError";
    this.code = code;
    this.statusCode = options?.statusCode;
    this.activityId = options?.activityId;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, CosmosError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      activityId: this.activityId,
      retryable: this.retryable,
    };
  }
}

/**
 * Configuration error.
 */
export class ConfigurationError extends CosmosError {
  constructor(
    message: string,
    code:
      | "InvalidEndpoint"
      | "MissingCredentials"
      | "InvalidConnectionString"
      | "MissingDatabase"
      | "MissingCollection"
      | "InvalidConfig" = "InvalidConfig"
  ) {
    super(message, `Configuration.${code}`);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Malformed signing inputs. Never retried.
 */
export class AuthenticationError extends CosmosError {
  constructor(message: string, code: "InvalidKey" | "InvalidSigningInput" = "InvalidSigningInput") {
    super(message, `Authentication.${code}`);
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Failure of a remote request, carrying the service's code and message verbatim.
 */
export class ResourceError extends CosmosError {
  public readonly remote: RemoteError;

  constructor(
    remote: RemoteError,
    options: { statusCode: number; activityId?: string; operation?: string }
  ) {
    super(
      `A ${remote.code} error occurred during ${options.operation ?? "the request"}. Error Message: ${remote.message}`,
      `Remote.${remote.code}`,
      { statusCode: options.statusCode, activityId: options.activityId, retryable: false }
    );
    this.name = "ResourceError";
    this.remote = remote;
    Object.setPrototypeOf(this, ResourceError.prototype);
  }
}

/**
 * Terminal failure of a paginated query.
 */
export class QueryError extends ResourceError {
  constructor(remote: RemoteError, options: { statusCode: number; activityId?: string }) {
    super(remote, { ...options, operation: "query execution" });
    this.name = "QueryError";
    Object.setPrototypeOf(this, QueryError.prototype);
  }
}

/**
 * Raised when the service keeps answering 429 beyond the configured budget,
 * or when rate-limit retries are disabled.
 */
export class RateLimitedError extends CosmosError {
  public readonly retryAfterMs?: number;
  public readonly attempts: number;

  constructor(attempts: number, retryAfterMs?: number, activityId?: string) {
    super(
      `Request rate is large: gave up after ${attempts} rate-limited attempt(s)`,
      "RateLimited.BudgetExhausted",
      { statusCode: 429, activityId, retryable: true }
    );
    this.name = "RateLimitedError";
    this.attempts = attempts;
    this.retryAfterMs = retryAfterMs;
    Object.setPrototypeOf(this, RateLimitedError.prototype);
  }
}

/**
 * The caller aborted the operation.
 */
export class CancelledError extends CosmosError {
  constructor(reason?: string) {
    super(reason ? `Operation cancelled: ${reason}` : "Operation cancelled", "Cancelled");
    this.name = "CancelledError";
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

/**
 * CancelledError carrying the abort reason of a signal.
 */
export function cancelledError(signal?: AbortSignal): CancelledError {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return new CancelledError(reason.message);
  return new CancelledError(typeof reason === "string" ? reason : undefined);
}

/**
 * Network/transport error.
 */
export class NetworkError extends CosmosError {
  constructor(message: string, code: "ConnectionFailed" | "Timeout") {
    super(message, `Network.${code}`, { retryable: true });
    this.name = "NetworkError";
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Caller input rejected before any request was sent.
 */
export class ValidationError extends CosmosError {
  constructor(
    message: string,
    code: "InvalidThroughput" | "CollectionNotFound" | "OfferNotFound" | "InvalidDocument"
  ) {
    super(message, `Validation.${code}`);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Decode a service error body. Bodies that do not carry a code and message
 * fall back to the HTTP status.
 */
export function parseRemoteError(status: number, body: string): RemoteError {
  const fallback: RemoteError = { code: `HTTP_${status}`, message: body || `HTTP ${status}` };
  if (!body) {
    return fallback;
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return fallback;
  }

  const parsed = remoteErrorSchema.safeParse(json);
  return parsed.success ? parsed.data : fallback;
}

/**
 * Type guard for Cosmos errors.
 */
export function isCosmosError(error: unknown): error is CosmosError {
  return error instanceof CosmosError;
}

/**
 * Check if an error is retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof CosmosError) {
    return error.retryable;
  }
  return false;
}
