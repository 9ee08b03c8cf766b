/**
 * Observability components for the Bulk API job client.
 *
 * Provides logging and metrics interfaces with pluggable implementations.
 */

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Log levels.
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

/**
 * Logger interface.
 */
export interface Logger {
  /** Log at trace level */
  trace(message: string, context?: Record<string, unknown>): void;
  /** Log at debug level */
  debug(message: string, context?: Record<string, unknown>): void;
  /** Log at info level */
  info(message: string, context?: Record<string, unknown>): void;
  /** Log at warn level */
  warn(message: string, context?: Record<string, unknown>): void;
  /** Log at error level */
  error(message: string, context?: Record<string, unknown>): void;
  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): Logger;
}

const DEFAULT_REDACT_KEYS = [
  'sessionid',
  'password',
  'securitytoken',
  'accesstoken',
  'refreshtoken',
  'clientsecret',
  'x-sfdc-session',
];

/**
 * Console logger writing one JSON object per line.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly redactKeys: Set<string>;

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    redactKeys?: string[];
  } = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? {};
    this.redactKeys = new Set((options.redactKeys ?? DEFAULT_REDACT_KEYS).map((k) => k.toLowerCase()));
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      redactKeys: Array.from(this.redactKeys),
    });
  }

  /**
   * Builds the line that would be written, or undefined when filtered out.
   */
  format(level: LogLevel, message: string, context?: Record<string, unknown>): string | undefined {
    if (level < this.level) return undefined;

    const mergedContext = this.redact({ ...this.context, ...context });
    const output = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(mergedContext).length > 0 ? { context: mergedContext } : {}),
    };
    return JSON.stringify(output);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const line = this.format(level, message, context);
    if (line === undefined) return;

    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (this.redactKeys.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * No-op logger.
 */
export class NoopLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * Captured log line.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing. Children append to the parent's entries.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    this.context = context;
    this.entries = entries;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.ERROR, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  private addEntry(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date(),
    });
  }

  /** Gets all log entries */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Gets entries at a specific level */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  /** Gets the messages of all entries, in order */
  getMessages(): string[] {
    return this.entries.map((e) => e.message);
  }

  /** Clears all entries */
  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// Metrics Interface
// ============================================================================

/**
 * Metric names for Bulk API operations.
 */
export const MetricNames = {
  REQUESTS_TOTAL: 'sf_bulk_requests_total',
  REQUEST_LATENCY: 'sf_bulk_request_latency_ms',
  ERRORS_TOTAL: 'sf_bulk_errors_total',

  JOBS_CREATED: 'sf_bulk_jobs_created_total',
  JOBS_CLOSED: 'sf_bulk_jobs_closed_total',
  JOBS_ABORTED: 'sf_bulk_jobs_aborted_total',
  BATCHES_SUBMITTED: 'sf_bulk_batches_submitted_total',
  BATCHES_FAILED: 'sf_bulk_batches_failed_total',
  STATUS_POLLS: 'sf_bulk_status_polls_total',
  RESULT_ROWS: 'sf_bulk_result_rows_total',
  WAIT_DURATION: 'sf_bulk_wait_duration_ms',
} as const;

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  /** Increment a counter */
  increment(name: string, value?: number, tags?: Record<string, string>): void;
  /** Set a gauge value */
  gauge(name: string, value: number, tags?: Record<string, string>): void;
  /** Record a histogram value */
  histogram(name: string, value: number, tags?: Record<string, string>): void;
  /** Record a timing value */
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

/**
 * No-op metrics collector.
 */
export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  gauge(): void {}
  histogram(): void {}
  timing(): void {}
}

/**
 * Metric entry for in-memory collector.
 */
export interface MetricEntry {
  name: string;
  type: 'counter' | 'gauge' | 'histogram' | 'timing';
  value: number;
  tags?: Record<string, string>;
  timestamp: Date;
}

/**
 * In-memory metrics collector for testing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly entries: MetricEntry[] = [];
  private readonly counters: Map<string, number> = new Map();
  private readonly gauges: Map<string, number> = new Map();

  increment(name: string, value: number = 1, tags?: Record<string, string>): void {
    const key = this.makeKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    this.entries.push({ name, type: 'counter', value, tags, timestamp: new Date() });
  }

  gauge(name: string, value: number, tags?: Record<string, string>): void {
    const key = this.makeKey(name, tags);
    this.gauges.set(key, value);
    this.entries.push({ name, type: 'gauge', value, tags, timestamp: new Date() });
  }

  histogram(name: string, value: number, tags?: Record<string, string>): void {
    this.entries.push({ name, type: 'histogram', value, tags, timestamp: new Date() });
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    this.entries.push({ name, type: 'timing', value: durationMs, tags, timestamp: new Date() });
  }

  private makeKey(name: string, tags?: Record<string, string>): string {
    if (!tags || Object.keys(tags).length === 0) return name;
    const sortedTags = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}{${sortedTags}}`;
  }

  /** Gets all metric entries */
  getEntries(): MetricEntry[] {
    return [...this.entries];
  }

  /** Gets counter value */
  getCounter(name: string, tags?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, tags)) ?? 0;
  }

  /** Gets gauge value */
  getGauge(name: string, tags?: Record<string, string>): number | undefined {
    return this.gauges.get(this.makeKey(name, tags));
  }

  /** Clears all entries */
  clear(): void {
    this.entries.length = 0;
    this.counters.clear();
    this.gauges.clear();
  }
}

// ============================================================================
// Observability Container
// ============================================================================

/**
 * Container for all observability components.
 */
export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
}

/**
 * Creates a no-op observability container.
 */
export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
  };
}

/**
 * Creates an in-memory observability container for testing.
 */
export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
  };
}

/**
 * Creates a console-based observability container.
 */
export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return {
    logger: new ConsoleLogger({ level }),
    metrics: new NoopMetricsCollector(),
  };
}
