import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/**
 * Correlation context attached to every log entry within one unit of work
 * (an inbound event, a reconciliation run, an admin request).
 */
export interface CorrelationContext {
  /** Unique ID for the unit of work. */
  correlationId: string;
  /** Ordering key of the event being processed (username or team id). */
  eventKey?: string;
  /** Where the work originated, e.g. 'directory-event', 'reconciliation', 'http'. */
  source?: string;
  /** Start timestamp for duration tracking */
  startTime?: number;
}

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  correlationId?: string;
  eventKey?: string;
  source?: string;
  /** Duration in ms since the context started */
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

export interface RecentLogQuery {
  limit?: number;
  level?: LogLevel;
  category?: LogCategory;
  correlationId?: string;
}

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * SyncLogger: structured, leveled, correlation-aware logger.
 *
 * - RFC 5424-inspired log levels with per-category overrides
 * - Correlation IDs propagated across async boundaries
 * - JSON output for production; pretty output for dev
 * - Secret redaction and payload truncation
 * - Ring buffer of recent entries for the admin API
 *
 * Usage:
 *   this.logger.info(LogCategory.EVENTS, 'Directory event applied', { username: 'p100001' });
 *   this.logger.error(LogCategory.VENDOR, 'Push failed', err, { username });
 */
@Injectable()
export class SyncLogger {
  private config: LogConfig;

  private readonly ringBuffer: StructuredLogEntry[] = [];
  private readonly maxRingBufferSize = 500;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  /** Run a function within a correlation context. */
  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return correlationStorage.run(ctx, fn);
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return { ...this.config, categoryLevels: { ...this.config.categoryLevels } };
  }

  updateConfig(partial: Partial<LogConfig>): void {
    Object.assign(this.config, partial);
  }

  setGlobalLevel(level: LogLevel | string): void {
    this.config.globalLevel = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  setCategoryLevel(category: LogCategory, level: LogLevel | string): void {
    this.config.categoryLevels[category] = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, category, message, data, this.formatError(error));
  }

  // ─── Ring buffer access (admin API) ───────────────────────────────

  getRecentLogs(options?: RecentLogQuery): StructuredLogEntry[] {
    let entries = [...this.ringBuffer];

    if (options?.level !== undefined) {
      const minLevel = options.level;
      entries = entries.filter((e) => parseLogLevel(e.level) >= minLevel);
    }
    if (options?.category) {
      const category: string = options.category;
      entries = entries.filter((e) => e.category === category);
    }
    if (options?.correlationId) {
      entries = entries.filter((e) => e.correlationId === options.correlationId);
    }

    const limit = options?.limit ?? 100;
    return entries.slice(-limit);
  }

  clearRecentLogs(): void {
    this.ringBuffer.length = 0;
  }

  // ─── Core logging logic ───────────────────────────────────────────

  /** Check if a log at the given level + category should be emitted. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    if (category) {
      const override = this.config.categoryLevels[category];
      if (override !== undefined) {
        return level >= override;
      }
    }
    return level >= this.config.globalLevel;
  }

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (level === LogLevel.OFF || !this.isEnabled(level, category)) return;

    const ctx = correlationStorage.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      correlationId: ctx?.correlationId,
      eventKey: ctx?.eventKey,
      source: ctx?.source,
    };

    if (ctx?.startTime) {
      entry.durationMs = Date.now() - ctx.startTime;
    }

    if (errorInfo) {
      entry.error = this.config.includeStackTraces
        ? errorInfo
        : { message: errorInfo.message, name: errorInfo.name };
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.ringBuffer.push(entry);
    if (this.ringBuffer.length > this.maxRingBufferSize) {
      this.ringBuffer.shift();
    }

    this.emit(level, entry);
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (error === undefined || error === null) return undefined;
    if (error instanceof Error) {
      return { message: error.message, name: error.name, stack: error.stack };
    }
    return { message: String(error) };
  }

  /** Truncate large payloads, redact secrets. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const max = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (/secret|password|token|authorization|bearer/i.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }

      if (typeof value === 'string' && value.length > max) {
        result[key] = value.slice(0, max) + `...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        result[key] = serialized.length > max ? serialized.slice(0, max) + '...[truncated]' : value;
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  private emit(level: LogLevel, entry: StructuredLogEntry): void {
    if (this.config.format === 'json') {
      const stream = level >= LogLevel.WARN ? process.stderr : process.stdout;
      stream.write(JSON.stringify(entry) + '\n');
    } else {
      this.emitPretty(level, entry);
    }
  }

  private emitPretty(level: LogLevel, entry: StructuredLogEntry): void {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = entry.level.padEnd(5);
    const cat = entry.category.padEnd(14);
    const corr = entry.correlationId ? ` [${entry.correlationId.slice(0, 8)}]` : '';
    const key = entry.eventKey ? ` key:${entry.eventKey}` : '';
    const dur = entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '';

    let line = `${ts} ${this.colorize(level, lvl)} ${cat}${corr}${key}${dur} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }

    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(line);
        break;
    }
  }

  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;
      case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;
      default: return text;
    }
  }
}
