/**
 * Azure Cosmos DB - Collection Service
 *
 * Collection operations: create, delete, exists, list.
 */

import { z } from "zod";
import { collectionLink, databaseLink, requireDatabase } from "../config/index.js";
import { getRequestCharge, getSessionToken } from "../transport/index.js";
import {
  CollectionInfo,
  IndexingPolicy,
  OperationResult,
  RequestOptions,
  ResourceResponse,
  collectionSchema,
} from "../types/index.js";
import { ResourceRequestor } from "./requestor.js";

const listCollectionsSchema = z.object({
  DocumentCollections: z.array(collectionSchema),
});

/**
 * Options of a collection-level call. The database defaults to the
 * configured one.
 */
export interface CollectionRequestOptions extends RequestOptions {
  databaseId?: string;
}

export interface CreateCollectionOptions extends CollectionRequestOptions {
  /** Provisioned throughput in request units per second. */
  throughput?: number;
  /** Partition key path, e.g. "/customerId". */
  partitionKeyPath?: string;
  indexingPolicy?: IndexingPolicy;
}

export class CollectionService {
  private readonly requestor: ResourceRequestor;

  constructor(requestor: ResourceRequestor) {
    this.requestor = requestor;
  }

  /**
   * Create a collection, optionally partitioned and with provisioned throughput.
   */
  async create(
    collectionId: string,
    options: CreateCollectionOptions = {}
  ): Promise<ResourceResponse<CollectionInfo>> {
    const link = databaseLink(requireDatabase(this.requestor.getConfig(), options.databaseId));

    const body: Record<string, unknown> = { id: collectionId };
    if (options.indexingPolicy) {
      body.indexingPolicy = options.indexingPolicy;
    }
    if (options.partitionKeyPath) {
      body.partitionKey = { paths: [options.partitionKeyPath], kind: "Hash" };
    }

    const headers: Record<string, string> = {};
    if (options.throughput !== undefined) {
      headers["x-ms-offer-throughput"] = options.throughput.toFixed(0);
    }

    return this.requestor.sendJson(
      {
        method: "POST",
        resourceType: "colls",
        resourceLink: link,
        path: `${link}/colls`,
        operation: "create collection",
        body: JSON.stringify(body),
        headers,
        options,
      },
      collectionSchema
    );
  }

  /**
   * Delete a collection and its documents.
   */
  async delete(collectionId: string, options: CollectionRequestOptions = {}): Promise<OperationResult> {
    const link = collectionLink(requireDatabase(this.requestor.getConfig(), options.databaseId), collectionId);
    return this.requestor.sendEmpty({
      method: "DELETE",
      resourceType: "colls",
      resourceLink: link,
      path: link,
      operation: "delete collection",
      options,
    });
  }

  /**
   * Check whether a collection exists. A 404 answers false.
   */
  async exists(
    collectionId: string,
    options: CollectionRequestOptions = {}
  ): Promise<ResourceResponse<boolean>> {
    const link = collectionLink(requireDatabase(this.requestor.getConfig(), options.databaseId), collectionId);
    const response = await this.requestor.send({
      method: "GET",
      resourceType: "colls",
      resourceLink: link,
      path: link,
      operation: "read collection",
      options,
      acceptStatus: [404],
    });

    return {
      resource: response.status !== 404,
      requestCharge: getRequestCharge(response),
      sessionToken: getSessionToken(response),
    };
  }

  /**
   * List the collections of a database.
   */
  async list(options: CollectionRequestOptions = {}): Promise<ResourceResponse<CollectionInfo[]>> {
    const link = databaseLink(requireDatabase(this.requestor.getConfig(), options.databaseId));
    const response = await this.requestor.sendJson(
      {
        method: "GET",
        resourceType: "colls",
        resourceLink: link,
        path: `${link}/colls`,
        operation: "list collections",
        options,
      },
      listCollectionsSchema
    );
    return { ...response, resource: response.resource.DocumentCollections };
  }
}
