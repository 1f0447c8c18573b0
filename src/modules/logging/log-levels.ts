/**
 * Structured Log Levels: follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE : Raw event payloads, vendor request/response bodies, per-user rule steps.
 *   DEBUG : Blast-radius membership, classification results, breaker bookkeeping.
 *   INFO  : Significant sync events: event applied, user pushed, reconciliation summary.
 *   WARN  : Recoverable anomalies: dangling reference repaired, retry scheduled, breaker opened.
 *   ERROR : Failed operations requiring attention: push failed, transaction rolled back.
 *   FATAL : Unrecoverable: bootstrap failed, secret not configured.
 *   OFF   : Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

const LEVEL_BY_NAME: Record<string, LogLevel> = {
  TRACE: LogLevel.TRACE,
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  FATAL: LogLevel.FATAL,
  OFF: LogLevel.OFF,
};

/** String → enum mapping (case-insensitive, numeric strings accepted). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  const named = LEVEL_BY_NAME[upper];
  if (named !== undefined) return named;
  const num = Number(upper);
  if (upper !== '' && Number.isInteger(num) && num >= LogLevel.TRACE && num <= LogLevel.OFF) {
    return Object.values(LEVEL_BY_NAME).find((level) => level === num) ?? LogLevel.INFO;
  }
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/** Log categories, one per subsystem of the sync engine. */
export enum LogCategory {
  /** Admin / ingress HTTP */
  HTTP = 'http',
  /** Admin shared-secret checks */
  AUTH = 'auth',
  /** State store transactions */
  STORE = 'store',
  /** Compliance rule evaluation */
  RULES = 'rules',
  /** Change event intake and processing */
  EVENTS = 'events',
  /** Outbound vendor calls */
  VENDOR = 'vendor',
  /** Daily true-up */
  RECONCILIATION = 'reconciliation',
  /** Initial state seeding */
  BOOTSTRAP = 'bootstrap',
  /** Directory collaborator */
  DIRECTORY = 'directory',
  /** Team registry collaborator */
  TEAM_REGISTRY = 'team-registry',
  /** Rate limiter, circuit breaker, retry queue, statistics */
  RESILIENCE = 'resilience',
  /** General / uncategorized */
  GENERAL = 'general',
}

const CATEGORIES: ReadonlySet<string> = new Set(Object.values(LogCategory));

export function isLogCategory(value: string): value is LogCategory {
  return CATEGORIES.has(value);
}

/** Runtime-configurable log configuration. */
export interface LogConfig {
  /** Global minimum log level (LOG_LEVEL, default INFO). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'vendor': LogLevel.DEBUG, 'events': LogLevel.TRACE }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum size of a logged payload field in bytes (default: 8KB). */
  maxPayloadSizeBytes: number;

  /** Output format: 'json' for structured (production), 'pretty' for human-readable (dev). */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(env: Record<string, string | undefined> = process.env): LogConfig {
  const isProd = env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(env.LOG_CATEGORY_LEVELS),
    includeStackTraces: env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd || env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  };
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "vendor=DEBUG,events=TRACE,store=WARN"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
