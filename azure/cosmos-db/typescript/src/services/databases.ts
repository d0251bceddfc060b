/**
 * Azure Cosmos DB - Database Service
 *
 * Database operations: create, delete, exists, list.
 */

import { z } from "zod";
import { databaseLink } from "../config/index.js";
import { getRequestCharge, getSessionToken } from "../transport/index.js";
import {
  DatabaseInfo,
  OperationResult,
  RequestOptions,
  ResourceResponse,
  databaseSchema,
} from "../types/index.js";
import { ResourceRequestor } from "./requestor.js";

const listDatabasesSchema = z.object({
  Databases: z.array(databaseSchema),
});

/**
 * Database service for account-level operations.
 */
export class DatabaseService {
  private readonly requestor: ResourceRequestor;

  constructor(requestor: ResourceRequestor) {
    this.requestor = requestor;
  }

  /**
   * Create a database.
   */
  async create(databaseId: string, options: RequestOptions = {}): Promise<ResourceResponse<DatabaseInfo>> {
    return this.requestor.sendJson(
      {
        method: "POST",
        resourceType: "dbs",
        resourceLink: "",
        path: "dbs",
        operation: "create database",
        body: JSON.stringify({ id: databaseId }),
        options,
      },
      databaseSchema
    );
  }

  /**
   * Delete a database and everything in it.
   */
  async delete(databaseId: string, options: RequestOptions = {}): Promise<OperationResult> {
    const link = databaseLink(databaseId);
    return this.requestor.sendEmpty({
      method: "DELETE",
      resourceType: "dbs",
      resourceLink: link,
      path: link,
      operation: "delete database",
      options,
    });
  }

  /**
   * Check whether a database exists. A 404 answers false.
   */
  async exists(databaseId: string, options: RequestOptions = {}): Promise<ResourceResponse<boolean>> {
    const link = databaseLink(databaseId);
    const response = await this.requestor.send({
      method: "GET",
      resourceType: "dbs",
      resourceLink: link,
      path: link,
      operation: "read database",
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
   * List the databases of the account.
   */
  async list(options: RequestOptions = {}): Promise<ResourceResponse<DatabaseInfo[]>> {
    const response = await this.requestor.sendJson(
      {
        method: "GET",
        resourceType: "dbs",
        resourceLink: "",
        path: "dbs",
        operation: "list databases",
        options,
      },
      listDatabasesSchema
    );
    return { ...response, resource: response.resource.Databases };
  }
}
