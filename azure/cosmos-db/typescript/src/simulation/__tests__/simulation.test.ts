import { describe, expect, it } from "vitest";
import { HttpRequest } from "../../transport/index.js";
import {
  MockTransport,
  createErrorResponse,
  createJsonResponse,
  createRateLimitedResponse,
} from "../index.js";

function request(method: HttpRequest["method"], url: string): HttpRequest {
  return { method, url, headers: { Accept: "application/json" } };
}

describe("MockTransport", () => {
  it("matches routes by method and URL substring", async () => {
    const transport = new MockTransport()
      .on("GET", "/dbs", () => createJsonResponse(200, { Databases: [] }))
      .on("POST", /\/docs$/, () => createJsonResponse(201, { id: "x" }));

    expect((await transport.send(request("GET", "https://a/dbs"))).status).toBe(200);
    expect((await transport.send(request("POST", "https://a/dbs/d/colls/c/docs"))).status).toBe(201);
    expect((await transport.send(request("DELETE", "https://a/dbs/d"))).status).toBe(404);
  });

  it("serves queued responses before routes", async () => {
    const transport = new MockTransport()
      .on("GET", "/dbs", () => createJsonResponse(200, {}))
      .enqueue(createRateLimitedResponse(10));

    expect((await transport.send(request("GET", "https://a/dbs"))).status).toBe(429);
    expect((await transport.send(request("GET", "https://a/dbs"))).status).toBe(200);
    expect(transport.getPendingCount()).toBe(0);
  });

  it("falls back to the default handler", async () => {
    const transport = new MockTransport().onDefault(() => createErrorResponse(503, "ServiceUnavailable", "down"));

    const response = await transport.send(request("GET", "https://a/anything"));

    expect(response.status).toBe(503);
    expect(JSON.parse(response.body)).toEqual({ code: "ServiceUnavailable", message: "down" });
  });

  it("records a copy of each request", async () => {
    const transport = new MockTransport();
    const sent = request("GET", "https://a/dbs");
    await transport.send(sent);
    sent.headers.Accept = "text/plain";

    expect(transport.getCalls()[0]?.headers).toEqual({ Accept: "application/json" });

    transport.clear();
    expect(transport.getCalls()).toEqual([]);
  });
});

describe("response helpers", () => {
  it("lower-cases header names", () => {
    const response = createJsonResponse(200, { a: 1 }, { "X-Ms-Request-Charge": "1.5" });

    expect(response.headers).toEqual({ "content-type": "application/json", "x-ms-request-charge": "1.5" });
    expect(response.body).toBe('{"a":1}');
  });

  it("builds a 429 with a retry delay", () => {
    expect(createRateLimitedResponse(250).headers["x-ms-retry-after-ms"]).toBe("250");
  });
});
