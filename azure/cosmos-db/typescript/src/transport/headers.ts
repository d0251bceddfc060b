/**
 * Header assembly shared by queries and resource operations.
 */

import type { CosmosConfig } from "../config/index.js";
import type { PartitionKeyValue, RequestOptions } from "../types/index.js";

/**
 * Partition key header value: a JSON array literal, or empty when unset.
 */
export function partitionKeyHeader(partitionKey?: PartitionKeyValue): string {
  return partitionKey === undefined ? "" : JSON.stringify([partitionKey]);
}

/**
 * Common request headers. Consistency and session headers are only sent
 * when set; the call's options win over the configured defaults.
 */
export function buildRequestHeaders(
  config: CosmosConfig,
  signed: Record<string, string>,
  options: RequestOptions = {}
): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    ...signed,
    "User-Agent": options.userAgent ?? config.userAgent,
  };

  const consistencyLevel = options.consistencyLevel ?? config.consistencyLevel;
  if (consistencyLevel) {
    headers["x-ms-consistency-level"] = consistencyLevel;
  }
  if (options.sessionToken) {
    headers["x-ms-session-token"] = options.sessionToken;
  }

  return headers;
}
