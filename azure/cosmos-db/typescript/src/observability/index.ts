/**
 * Azure Cosmos DB Observability Module
 *
 * Logging and metrics for Cosmos DB operations.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export type LogContext = Record<string, unknown>;

/**
 * Logger interface.
 */
export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Metric names emitted by the client.
 */
export const MetricNames = {
  REQUESTS_TOTAL: "cosmos_requests_total",
  REQUEST_CHARGE: "cosmos_request_charge",
  QUERY_PAGES_TOTAL: "cosmos_query_pages_total",
  RATE_LIMITED_TOTAL: "cosmos_rate_limited_total",
  ERRORS_TOTAL: "cosmos_errors_total",
} as const;

// Compared case-insensitively against whole context keys.
const SENSITIVE_FIELDS = new Set([
  "key",
  "masterkey",
  "secretkey",
  "accountkey",
  "connectionstring",
  "authorization",
  "password",
]);

function sanitizeContext(context: LogContext): LogContext {
  const sanitized: LogContext = {};

  for (const [key, value] of Object.entries(context)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      sanitized[key] = "[REDACTED]";
    } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      sanitized[key] = sanitizeContext(Object.fromEntries(Object.entries(value)));
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Console logger writing one line per entry.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: LogContext;

  constructor(level: LogLevel = "info", context: LogContext = {}) {
    this.level = level;
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level];
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const merged = sanitizeContext({ ...this.context, ...context });
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
    return `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}${contextStr}`;
  }

  error(message: string, context?: LogContext): void {
    if (this.shouldLog("error")) console.error(this.format("error", message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog("warn")) console.warn(this.format("warn", message, context));
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog("info")) console.info(this.format("info", message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog("debug")) console.debug(this.format("debug", message, context));
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.level, { ...this.context, ...context });
  }
}

export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
}

/**
 * In-memory logger for testing. Children share the parent's entry list.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly contextData: LogContext;

  constructor(context: LogContext = {}, entries: LogEntry[] = []) {
    this.contextData = context;
    this.entries = entries;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({ level, message, context: sanitizeContext({ ...this.contextData, ...context }) });
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.contextData, ...context }, this.entries);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * In-memory metrics collector for testing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(",");
    return `${name}{${labelStr}}`;
  }

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const existing = this.histograms.get(key) ?? [];
    existing.push(value);
    this.histograms.set(key, existing);
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: Record<string, string>): number[] {
    return this.histograms.get(this.makeKey(name, labels)) ?? [];
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: Record<string, string>): void {}
  recordHistogram(_name: string, _value: number, _labels?: Record<string, string>): void {}
}

export function createConsoleLogger(level: LogLevel = "info"): Logger {
  return new ConsoleLogger(level);
}

export function createNoopLogger(): Logger {
  return new NoopLogger();
}

export function createInMemoryLogger(): InMemoryLogger {
  return new InMemoryLogger();
}

export function createNoopMetricsCollector(): MetricsCollector {
  return new NoopMetricsCollector();
}

export function createInMemoryMetricsCollector(): InMemoryMetricsCollector {
  return new InMemoryMetricsCollector();
}
