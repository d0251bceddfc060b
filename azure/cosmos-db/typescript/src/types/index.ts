/**
 * Azure Cosmos DB Types
 */

import { z } from "zod";
import type { ConsistencyLevel } from "../config/index.js";

/**
 * One result record: a field/value map whose shape is only known at runtime.
 */
export type DocumentRecord = Record<string, unknown>;

/** Partition key value as sent in `x-ms-documentdb-partitionkey`. */
export type PartitionKeyValue = string | number | boolean;

/**
 * Per-request header options shared by all operations.
 */
export interface RequestOptions {
  consistencyLevel?: ConsistencyLevel;
  sessionToken?: string;
  userAgent?: string;
  signal?: AbortSignal;
}

/**
 * Options of a partition-scoped request.
 */
export interface PartitionedRequestOptions extends RequestOptions {
  partitionKey?: PartitionKeyValue;
}

/**
 * Options of a paginated query.
 */
export interface QueryOptions extends PartitionedRequestOptions {
  /** Defaults to true when no partition key is given. */
  enableCrossPartitionQuery?: boolean;
  /** Page size hint (`x-ms-max-item-count`). */
  maxItemCount?: number;
}

/**
 * One parsed query response page.
 */
export interface QueryPage {
  documents: DocumentRecord[];
  requestCharge: number;
  continuation?: string;
  sessionToken?: string;
}

/**
 * Merged result of a paginated query.
 */
export interface QueryResult {
  /** Records of every page; fields missing from a record are null. */
  documents: DocumentRecord[];
  /** Union of the fields of all records, in first-seen order. */
  fields: string[];
  /** Sum of the request charge of every page. */
  requestCharge: number;
  /** Session token of the last page. */
  sessionToken?: string;
  pageCount: number;
  /** Number of 429 responses that were retried. */
  retryCount: number;
}

/**
 * Result of a non-query operation.
 */
export interface ResourceResponse<T> {
  resource: T;
  requestCharge: number;
  sessionToken?: string;
}

/**
 * Charge and session of an operation without a payload.
 */
export type OperationResult = ResourceResponse<undefined>;

const systemProperties = {
  id: z.string(),
  _rid: z.string().optional(),
  _self: z.string().optional(),
  _etag: z.string().optional(),
  _ts: z.number().optional(),
};

export const databaseSchema = z.object(systemProperties).passthrough();

export const indexingPolicySchema = z
  .object({
    indexingMode: z.string().optional(),
    automatic: z.boolean().optional(),
    includedPaths: z.array(z.object({ path: z.string() }).passthrough()).optional(),
    excludedPaths: z.array(z.object({ path: z.string() }).passthrough()).optional(),
  })
  .passthrough();

export const collectionSchema = z
  .object({
    ...systemProperties,
    indexingPolicy: indexingPolicySchema.optional(),
    partitionKey: z.object({ paths: z.array(z.string()), kind: z.string() }).passthrough().optional(),
  })
  .passthrough();

export const offerSchema = z
  .object({
    ...systemProperties,
    offerVersion: z.string().optional(),
    offerType: z.string().optional(),
    content: z
      .object({
        offerThroughput: z.number().optional(),
        userSpecifiedThroughput: z.number().optional(),
      })
      .passthrough()
      .optional(),
    resource: z.string().optional(),
    offerResourceId: z.string().optional(),
  })
  .passthrough();

export const documentSchema = z.record(z.unknown());

export type DatabaseInfo = z.infer<typeof databaseSchema>;
export type IndexingPolicy = z.infer<typeof indexingPolicySchema>;
export type CollectionInfo = z.infer<typeof collectionSchema>;
export type OfferInfo = z.infer<typeof offerSchema>;
