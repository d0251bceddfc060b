/**
 * Azure Cosmos DB - Document Service
 *
 * Document operations: get, upsert, delete, query, count and their batch
 * variants. Batch variants run one request at a time and thread the session
 * token from each response into the next request.
 */

import { collectionLink, requireCollection, requireDatabase } from "../config/index.js";
import { ValidationError } from "../errors.js";
import { QueryExecutor } from "../query/executor.js";
import { UNNAMED_FIELD } from "../query/merge.js";
import {
  DocumentRecord,
  OperationResult,
  PartitionKeyValue,
  PartitionedRequestOptions,
  QueryOptions,
  QueryResult,
  ResourceResponse,
  documentSchema,
} from "../types/index.js";
import { ResourceRequestor } from "./requestor.js";

/** Number of ids fetched per round of a bulk delete. */
export const DELETE_BATCH_SIZE = 1000;

/**
 * Target collection of a document call; both default to the configuration.
 */
export interface CollectionTarget {
  databaseId?: string;
  collectionId?: string;
}

export type DocumentRequestOptions = PartitionedRequestOptions & CollectionTarget;

export type DocumentQueryOptions = QueryOptions & CollectionTarget;

export interface UpsertManyOptions extends Omit<DocumentRequestOptions, "partitionKey"> {
  /** Field of each document holding its partition key value. */
  partitionKeyField?: string;
}

export interface PredicateOptions extends DocumentRequestOptions {
  /** SQL condition over the alias `c`, e.g. "c.status = 'done'". */
  predicate?: string;
}

function isPartitionKeyValue(value: unknown): value is PartitionKeyValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function withPredicate(queryText: string, predicate?: string): string {
  return predicate ? `${queryText} WHERE ${predicate}` : queryText;
}

export class DocumentService {
  private readonly requestor: ResourceRequestor;
  private readonly executor: QueryExecutor;

  constructor(requestor: ResourceRequestor, executor: QueryExecutor) {
    this.requestor = requestor;
    this.executor = executor;
  }

  private collectionLinkFor(target: CollectionTarget): string {
    const config = this.requestor.getConfig();
    return collectionLink(
      requireDatabase(config, target.databaseId),
      requireCollection(config, target.collectionId)
    );
  }

  /**
   * Read a single document.
   */
  async get(documentId: string, options: DocumentRequestOptions = {}): Promise<ResourceResponse<DocumentRecord>> {
    const link = `${this.collectionLinkFor(options)}/docs/${documentId}`;
    return this.requestor.sendJson(
      {
        method: "GET",
        resourceType: "docs",
        resourceLink: link,
        path: link,
        operation: "read document",
        options,
      },
      documentSchema
    );
  }

  /**
   * Insert or replace a document. The document must carry a non-empty `id`;
   * a finite numeric id is sent as its decimal string.
   */
  async upsert(
    document: DocumentRecord,
    options: DocumentRequestOptions = {}
  ): Promise<ResourceResponse<DocumentRecord>> {
    const rawId = document.id;
    const id = typeof rawId === "number" && Number.isFinite(rawId) ? String(rawId) : rawId;
    if (typeof id !== "string" || id.length === 0) {
      throw new ValidationError("Document must have a non-empty string id", "InvalidDocument");
    }

    const link = this.collectionLinkFor(options);
    return this.requestor.sendJson(
      {
        method: "POST",
        resourceType: "docs",
        resourceLink: link,
        path: `${link}/docs`,
        operation: "upsert document",
        body: JSON.stringify({ ...document, id }),
        headers: { "x-ms-documentdb-is-upsert": "True" },
        options,
      },
      documentSchema
    );
  }

  /**
   * Upsert documents one after another, summing their charge.
   */
  async upsertMany(
    documents: readonly DocumentRecord[],
    options: UpsertManyOptions = {}
  ): Promise<ResourceResponse<number>> {
    const { partitionKeyField, ...requestOptions } = options;
    let sessionToken = requestOptions.sessionToken;
    let requestCharge = 0;

    for (const document of documents) {
      const partitionValue = partitionKeyField ? document[partitionKeyField] : undefined;
      const result = await this.upsert(document, {
        ...requestOptions,
        sessionToken,
        partitionKey: isPartitionKeyValue(partitionValue) ? partitionValue : undefined,
      });
      requestCharge += result.requestCharge;
      sessionToken = result.sessionToken ?? sessionToken;
    }

    return { resource: documents.length, requestCharge, sessionToken };
  }

  /**
   * Delete a single document.
   */
  async delete(documentId: string, options: DocumentRequestOptions = {}): Promise<OperationResult> {
    const link = `${this.collectionLinkFor(options)}/docs/${documentId}`;
    return this.requestor.sendEmpty({
      method: "DELETE",
      resourceType: "docs",
      resourceLink: link,
      path: link,
      operation: "delete document",
      options,
    });
  }

  /**
   * Delete every document matching `predicate` (all documents when absent),
   * in rounds of {@link DELETE_BATCH_SIZE}. Resolves to the number deleted.
   */
  async deleteMany(options: PredicateOptions = {}): Promise<ResourceResponse<number>> {
    const { predicate, ...requestOptions } = options;
    const idQuery = withPredicate(`SELECT TOP ${DELETE_BATCH_SIZE} c.id FROM c`, predicate);
    let sessionToken = requestOptions.sessionToken;
    let requestCharge = 0;
    let deleted = 0;

    for (;;) {
      const ids = await this.query(idQuery, {
        ...requestOptions,
        sessionToken,
        maxItemCount: DELETE_BATCH_SIZE,
      });
      requestCharge += ids.requestCharge;
      sessionToken = ids.sessionToken ?? sessionToken;

      const idsToDelete = ids.documents
        .map((document) => document.id)
        .filter((id): id is string => typeof id === "string");
      if (idsToDelete.length === 0) {
        break;
      }

      for (const id of idsToDelete) {
        const result = await this.delete(id, { ...requestOptions, sessionToken });
        requestCharge += result.requestCharge;
        sessionToken = result.sessionToken ?? sessionToken;
        deleted++;
      }
    }

    return { resource: deleted, requestCharge, sessionToken };
  }

  /**
   * Run a SQL query across all result pages.
   */
  async query(queryText: string, options: DocumentQueryOptions = {}): Promise<QueryResult> {
    const { databaseId, collectionId, ...queryOptions } = options;
    return this.executor.execute({
      collectionLink: this.collectionLinkFor({ databaseId, collectionId }),
      query: queryText,
      options: queryOptions,
    });
  }

  /**
   * Count documents matching `predicate`. Partial counts returned per
   * partition are summed.
   */
  async count(options: PredicateOptions = {}): Promise<ResourceResponse<number>> {
    const { predicate, ...queryOptions } = options;
    const result = await this.query(withPredicate("SELECT count(c.id) FROM c", predicate), queryOptions);

    const count = result.documents.reduce((total, record) => {
      const value = record[UNNAMED_FIELD];
      return typeof value === "number" ? total + value : total;
    }, 0);

    return { resource: count, requestCharge: result.requestCharge, sessionToken: result.sessionToken };
  }
}
