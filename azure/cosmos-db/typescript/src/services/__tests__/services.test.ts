import { describe, expect, it } from "vitest";
import { MOCK_ENDPOINT } from "../../client/index.js";
import { ResourceError, ValidationError } from "../../errors.js";
import { MetricNames, createInMemoryMetricsCollector } from "../../observability/index.js";
import {
  MockTransport,
  createErrorResponse,
  createJsonResponse,
  createMockTransport,
} from "../../simulation/index.js";
import { createTestClient, headerOf, page } from "../../__tests__/fixtures.js";

function setup() {
  const transport: MockTransport = createMockTransport();
  const metrics = createInMemoryMetricsCollector();
  const client = createTestClient(transport, { metrics });
  return { transport, client, metrics };
}

function noContent(charge: string, session?: string) {
  const headers: Record<string, string> = { "x-ms-request-charge": charge };
  if (session) headers["x-ms-session-token"] = session;
  return createJsonResponse(204, undefined, headers);
}

describe("DatabaseService", () => {
  it("creates a database", async () => {
    const { transport, client } = setup();
    transport.enqueue(createJsonResponse(201, { id: "appdb", _rid: "dbRid==" }, { "x-ms-request-charge": "4.95" }));

    const result = await client.databases().create("appdb");

    expect(result.resource).toEqual({ id: "appdb", _rid: "dbRid==" });
    expect(result.requestCharge).toBe(4.95);
    const [call] = transport.getCalls();
    expect(call?.method).toBe("POST");
    expect(call?.url).toBe(`${MOCK_ENDPOINT}/dbs`);
    expect(call?.body).toBe('{"id":"appdb"}');
    expect(call?.headers["Content-Type"]).toBe("application/json");
  });

  it("reports conflicts with the service message", async () => {
    const { transport, client, metrics } = setup();
    transport.enqueue(createErrorResponse(409, "Conflict", "Resource with specified id already exists"));

    const error = await client
      .databases()
      .create("appdb")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResourceError);
    expect(error).toMatchObject({
      message: "A Conflict error occurred during create database. Error Message: Resource with specified id already exists",
      statusCode: 409,
    });
    expect(metrics.getCounter(MetricNames.ERRORS_TOTAL, { operation: "create database" })).toBe(1);
  });

  it("answers exists from the status", async () => {
    const { transport, client } = setup();
    transport.enqueue(
      createJsonResponse(200, { id: "appdb" }),
      createErrorResponse(404, "NotFound", "Resource Not Found")
    );

    expect((await client.databases().exists("appdb")).resource).toBe(true);
    expect((await client.databases().exists("missing")).resource).toBe(false);
    expect(transport.getCalls()[1]?.url).toBe(`${MOCK_ENDPOINT}/dbs/missing`);
  });

  it("lists databases", async () => {
    const { transport, client } = setup();
    transport.enqueue(createJsonResponse(200, { _rid: "", Databases: [{ id: "a" }, { id: "b" }], _count: 2 }));

    const result = await client.databases().list();

    expect(result.resource.map((db) => db.id)).toEqual(["a", "b"]);
  });

  it("rejects a body of the wrong shape", async () => {
    const { transport, client } = setup();
    transport.enqueue(createJsonResponse(200, { Databases: "nope" }));

    await expect(client.databases().list()).rejects.toMatchObject({ code: "Response.Malformed" });
  });

  it("deletes a database", async () => {
    const { transport, client } = setup();
    transport.enqueue(noContent("2"));

    const result = await client.databases().delete("appdb");

    expect(result).toEqual({ resource: undefined, requestCharge: 2, sessionToken: undefined });
    expect(transport.getCalls()[0]?.method).toBe("DELETE");
    expect(transport.getCalls()[0]?.url).toBe(`${MOCK_ENDPOINT}/dbs/appdb`);
  });
});

describe("CollectionService", () => {
  it("creates a partitioned collection with throughput", async () => {
    const { transport, client } = setup();
    transport.enqueue(createJsonResponse(201, { id: "orders", _rid: "cRid==" }));

    await client.collections().create("orders", { throughput: 400, partitionKeyPath: "/customerId" });

    const [call] = transport.getCalls();
    expect(call?.url).toBe(`${MOCK_ENDPOINT}/dbs/testdb/colls`);
    expect(call?.headers["x-ms-offer-throughput"]).toBe("400");
    expect(JSON.parse(call?.body ?? "")).toEqual({
      id: "orders",
      partitionKey: { paths: ["/customerId"], kind: "Hash" },
    });
  });

  it("targets another database when asked", async () => {
    const { transport, client } = setup();
    transport.enqueue(createJsonResponse(200, { DocumentCollections: [{ id: "x" }] }));

    const result = await client.collections().list({ databaseId: "otherdb" });

    expect(result.resource).toEqual([{ id: "x" }]);
    expect(transport.getCalls()[0]?.url).toBe(`${MOCK_ENDPOINT}/dbs/otherdb/colls`);
  });

  it("answers false for a missing collection", async () => {
    const { transport, client } = setup();
    transport.enqueue(createErrorResponse(404, "NotFound", "Resource Not Found"));

    expect((await client.collections().exists("gone")).resource).toBe(false);
  });
});

describe("DocumentService", () => {
  it("reads a document", async () => {
    const { transport, client } = setup();
    transport.enqueue(createJsonResponse(200, { id: "doc-1", total: 3 }, { "x-ms-session-token": "0:4" }));

    const result = await client.documents().get("doc-1", { partitionKey: "tenant-1" });

    expect(result.resource).toEqual({ id: "doc-1", total: 3 });
    expect(result.sessionToken).toBe("0:4");
    expect(transport.getCalls()[0]?.url).toBe(`${MOCK_ENDPOINT}/dbs/testdb/colls/testcoll/docs/doc-1`);
    expect(headerOf(transport, 0, "x-ms-documentdb-partitionkey")).toBe('["tenant-1"]');
  });

  it("upserts a document", async () => {
    const { transport, client } = setup();
    transport.enqueue(createJsonResponse(200, { id: "doc-1", total: 3 }, { "x-ms-request-charge": "6.1" }));

    const result = await client.documents().upsert({ id: "doc-1", total: 3 }, { partitionKey: 7 });

    expect(result.requestCharge).toBe(6.1);
    const [call] = transport.getCalls();
    expect(call?.method).toBe("POST");
    expect(call?.url).toBe(`${MOCK_ENDPOINT}/dbs/testdb/colls/testcoll/docs`);
    expect(call?.body).toBe('{"id":"doc-1","total":3}');
    expect(call?.headers["x-ms-documentdb-is-upsert"]).toBe("True");
    expect(call?.headers["x-ms-documentdb-partitionkey"]).toBe("[7]");
  });

  it("requires a usable id before sending", async () => {
    const { transport, client } = setup();

    await expect(client.documents().upsert({ total: 3 })).rejects.toBeInstanceOf(ValidationError);
    await expect(client.documents().upsert({ id: "" })).rejects.toMatchObject({ code: "Validation.InvalidDocument" });
    await expect(client.documents().upsert({ id: true })).rejects.toMatchObject({ code: "Validation.InvalidDocument" });
    await expect(client.documents().upsert({ id: Number.NaN })).rejects.toMatchObject({
      code: "Validation.InvalidDocument",
    });
    expect(transport.getCalls()).toHaveLength(0);
  });

  it("sends a numeric id as a string", async () => {
    const { transport, client } = setup();
    transport.enqueue(
      createJsonResponse(200, { id: "5" }, { "x-ms-request-charge": "1" }),
      createJsonResponse(200, { id: "1" }, { "x-ms-request-charge": "1" })
    );

    await client.documents().upsert({ id: 5 });
    await client.documents().upsertMany([{ id: 1, v: "x" }]);

    const calls = transport.getCalls();
    expect(calls[0]?.body).toBe('{"id":"5"}');
    expect(calls[1]?.body).toBe('{"id":"1","v":"x"}');
  });

  it("threads the session token through upsertMany", async () => {
    const { transport, client } = setup();
    transport.enqueue(
      createJsonResponse(200, { id: "a" }, { "x-ms-request-charge": "5", "x-ms-session-token": "0:10" }),
      createJsonResponse(200, { id: "b" }, { "x-ms-request-charge": "5.5", "x-ms-session-token": "0:11" })
    );

    const result = await client.documents().upsertMany(
      [
        { id: "a", tenant: "t1" },
        { id: "b", tenant: "t2" },
      ],
      { partitionKeyField: "tenant" }
    );

    expect(result).toEqual({ resource: 2, requestCharge: 10.5, sessionToken: "0:11" });
    expect(headerOf(transport, 0, "x-ms-session-token")).toBeUndefined();
    expect(headerOf(transport, 1, "x-ms-session-token")).toBe("0:10");
    expect(headerOf(transport, 0, "x-ms-documentdb-partitionkey")).toBe('["t1"]');
    expect(headerOf(transport, 1, "x-ms-documentdb-partitionkey")).toBe('["t2"]');
  });

  it("deletes a document", async () => {
    const { transport, client } = setup();
    transport.enqueue(noContent("1.2"));

    const result = await client.documents().delete("doc-1", { collectionId: "archive" });

    expect(result.requestCharge).toBe(1.2);
    expect(transport.getCalls()[0]?.url).toBe(`${MOCK_ENDPOINT}/dbs/testdb/colls/archive/docs/doc-1`);
  });

  it("deletes matching documents in rounds", async () => {
    const { transport, client } = setup();
    transport.enqueue(
      page([{ id: "a" }, { id: "b" }], { charge: "2" }),
      noContent("1"),
      noContent("1"),
      page([], { charge: "1" })
    );

    const result = await client.documents().deleteMany({ predicate: "c.done = true" });

    expect(result.resource).toBe(2);
    expect(result.requestCharge).toBe(5);
    const calls = transport.getCalls();
    expect(calls.map((call) => call.method)).toEqual(["POST", "DELETE", "DELETE", "POST"]);
    expect(calls[0]?.body).toBe('{"query":"SELECT TOP 1000 c.id FROM c WHERE c.done = true"}');
    expect(calls[0]?.headers["x-ms-max-item-count"]).toBe("1000");
    expect(calls[1]?.url).toBe(`${MOCK_ENDPOINT}/dbs/testdb/colls/testcoll/docs/a`);
    expect(calls[2]?.url).toBe(`${MOCK_ENDPOINT}/dbs/testdb/colls/testcoll/docs/b`);
  });

  it("queries across pages", async () => {
    const { transport, client } = setup();
    transport.enqueue(page([{ id: "a" }], { continuation: "token-1" }), page([{ id: "b", extra: true }]));

    const result = await client.documents().query("SELECT * FROM c", { databaseId: "db2" });

    expect(result.documents).toEqual([
      { id: "a", extra: null },
      { id: "b", extra: true },
    ]);
    expect(transport.getCalls()[0]?.url).toBe(`${MOCK_ENDPOINT}/dbs/db2/colls/testcoll/docs`);
  });

  it("sums partial counts", async () => {
    const { transport, client } = setup();
    transport.enqueue(
      page([{ $1: 3 }], { charge: "2.5", continuation: "token-1" }),
      page([{ $1: 4 }], { charge: "2.5" })
    );

    const result = await client.documents().count({ predicate: "c.total > 10" });

    expect(result.resource).toBe(7);
    expect(result.requestCharge).toBe(5);
    expect(transport.getCalls()[0]?.body).toBe('{"query":"SELECT count(c.id) FROM c WHERE c.total > 10"}');
  });
});
