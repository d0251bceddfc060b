import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConsoleLogger,
  InMemoryLogger,
  InMemoryMetricsCollector,
  MetricNames,
  createNoopLogger,
} from "../index.js";

describe("InMemoryLogger", () => {
  it("records entries with their context", () => {
    const logger = new InMemoryLogger();
    logger.info("started", { database: "appdb" });
    logger.debug("page", { page: 1 });

    expect(logger.getLogs()).toEqual([
      { level: "info", message: "started", context: { database: "appdb" } },
      { level: "debug", message: "page", context: { page: 1 } },
    ]);
    expect(logger.getLogsByLevel("debug")).toHaveLength(1);
  });

  it("redacts credentials but not similarly named fields", () => {
    const logger = new InMemoryLogger();
    logger.warn("signed", {
      authorization: "type%3dmaster",
      masterKey: "test-secret",
      partitionKey: "tenant-1",
      sessionToken: "0:1",
      nested: { connectionString: "AccountKey=x" },
    });

    expect(logger.getLogs()[0]?.context).toEqual({
      authorization: "[REDACTED]",
      masterKey: "[REDACTED]",
      partitionKey: "tenant-1",
      sessionToken: "0:1",
      nested: { connectionString: "[REDACTED]" },
    });
  });

  it("shares entries with children and merges their context", () => {
    const logger = new InMemoryLogger();
    const child = logger.child({ collectionLink: "dbs/a/colls/b" });
    child.error("failed", { status: 500 });

    expect(logger.getLogs()).toEqual([
      { level: "error", message: "failed", context: { collectionLink: "dbs/a/colls/b", status: 500 } },
    ]);

    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("filters by level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("info");

    logger.debug("hidden");
    logger.info("shown", { key: "test-secret" });

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(/^\[.+\] INFO shown \{"key":"\[REDACTED\]"\}$/);
  });
});

describe("NoopLogger", () => {
  it("returns itself as child", () => {
    const logger = createNoopLogger();
    expect(logger.child({ a: 1 })).toBe(logger);
  });
});

describe("InMemoryMetricsCollector", () => {
  it("keys counters by sorted labels", () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, { operation: "query", region: "west" });
    metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 2, { region: "west", operation: "query" });
    metrics.incrementCounter(MetricNames.REQUESTS_TOTAL);

    expect(metrics.getCounter(MetricNames.REQUESTS_TOTAL, { operation: "query", region: "west" })).toBe(3);
    expect(metrics.getCounter(MetricNames.REQUESTS_TOTAL)).toBe(1);
    expect(metrics.getCounter(MetricNames.ERRORS_TOTAL)).toBe(0);
  });

  it("records histogram values in order", () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.recordHistogram(MetricNames.REQUEST_CHARGE, 2.5);
    metrics.recordHistogram(MetricNames.REQUEST_CHARGE, 1);

    expect(metrics.getHistogram(MetricNames.REQUEST_CHARGE)).toEqual([2.5, 1]);

    metrics.clear();
    expect(metrics.getHistogram(MetricNames.REQUEST_CHARGE)).toEqual([]);
  });
});
