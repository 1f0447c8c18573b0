/**
 * Typed runtime settings, resolved once from environment variables.
 *
 * Every numeric setting falls back to its default when the variable is
 * missing or not a positive number.
 */
import { join } from 'node:path';

export const SYNC_CONFIG = 'SYNC_CONFIG';

export type PersistenceBackend = 'sqlite' | 'inmemory';
export type IntegrationMode = 'http' | 'fixture';

export interface RateLimitSettings {
  permits: number;
  periodMs: number;
  timeoutMs: number;
}

export interface CircuitBreakerSettings {
  windowSize: number;
  minimumCalls: number;
  /** Failure percentage (0-100) at or above which the circuit opens. */
  failureRateThreshold: number;
  openDurationMs: number;
  halfOpenMaxCalls: number;
}

export interface SyncConfig {
  persistenceBackend: PersistenceBackend;
  databasePath: string;
  integrationMode: IntegrationMode;
  fixturePath: string;
  directory: { baseUrl: string; pageSize: number; maxUsers: number; timeoutMs: number };
  teamRegistry: { baseUrl: string; timeoutMs: number };
  vendor: {
    baseUrl: string;
    apiToken: string | undefined;
    timeoutMs: number;
    rateLimit: RateLimitSettings;
    circuitBreaker: CircuitBreakerSettings;
    retryScheduleMinutes: number[];
  };
  events: { workerConcurrency: number; backlogLimit: number; managementRoles: string[] };
  reconciliation: { cron: string; enabled: boolean };
  bootstrap: { onStartup: boolean; reconcileAfter: boolean };
  adminSharedSecret: string | undefined;
}

export type EnvReader = (key: string) => string | undefined;

export const DEFAULT_RECONCILIATION_CRON = '0 2 * * *';
export const DEFAULT_RETRY_SCHEDULE_MINUTES = [1, 2, 4, 8, 16];

export function envReader(env: Record<string, string | undefined>): EnvReader {
  return (key) => env[key];
}

export function buildSyncConfig(read: EnvReader = envReader(process.env)): SyncConfig {
  const isProd = read('NODE_ENV') === 'production';
  return {
    persistenceBackend: read('PERSISTENCE_BACKEND')?.toLowerCase() === 'inmemory' ? 'inmemory' : 'sqlite',
    databasePath: read('DATABASE_PATH') || join(process.cwd(), 'data', 'access-sync.db'),
    integrationMode: parseIntegrationMode(read('INTEGRATION_MODE'), isProd),
    fixturePath: read('FIXTURE_PATH') || join(process.cwd(), 'fixtures'),
    directory: {
      baseUrl: read('DIRECTORY_BASE_URL') ?? '',
      pageSize: positiveInt(read('DIRECTORY_PAGE_SIZE'), 500),
      maxUsers: positiveInt(read('DIRECTORY_MAX_USERS'), 50_000),
      timeoutMs: positiveInt(read('DIRECTORY_TIMEOUT_MS'), 30_000),
    },
    teamRegistry: {
      baseUrl: read('TEAM_REGISTRY_BASE_URL') ?? '',
      timeoutMs: positiveInt(read('TEAM_REGISTRY_TIMEOUT_MS'), 10_000),
    },
    vendor: {
      baseUrl: read('VENDOR_BASE_URL') ?? '',
      apiToken: read('VENDOR_API_TOKEN') || undefined,
      timeoutMs: positiveInt(read('VENDOR_TIMEOUT_MS'), 10_000),
      rateLimit: {
        permits: positiveInt(read('VENDOR_RATE_LIMIT_PERMITS'), 20),
        periodMs: positiveInt(read('VENDOR_RATE_LIMIT_PERIOD_MS'), 60_000),
        timeoutMs: positiveInt(read('VENDOR_RATE_LIMIT_TIMEOUT_MS'), 2_000),
      },
      circuitBreaker: {
        windowSize: positiveInt(read('VENDOR_CB_WINDOW_SIZE'), 5),
        minimumCalls: positiveInt(read('VENDOR_CB_MINIMUM_CALLS'), 3),
        failureRateThreshold: positiveInt(read('VENDOR_CB_FAILURE_RATE'), 50),
        openDurationMs: positiveInt(read('VENDOR_CB_OPEN_DURATION_MS'), 60_000),
        halfOpenMaxCalls: positiveInt(read('VENDOR_CB_HALF_OPEN_CALLS'), 1),
      },
      retryScheduleMinutes: parseSchedule(read('VENDOR_RETRY_SCHEDULE_MINUTES')),
    },
    events: {
      workerConcurrency: positiveInt(read('EVENT_WORKER_CONCURRENCY'), 4),
      backlogLimit: positiveInt(read('EVENT_BACKLOG_LIMIT'), 10_000),
      managementRoles: parseList(read('MANAGEMENT_ROLES'), ['LEAD']).map((r) => r.toUpperCase()),
    },
    reconciliation: {
      cron: read('RECONCILIATION_CRON') || DEFAULT_RECONCILIATION_CRON,
      enabled: read('RECONCILIATION_ENABLED') !== 'false',
    },
    bootstrap: {
      onStartup: read('BOOTSTRAP_ON_STARTUP') !== 'false',
      reconcileAfter: read('BOOTSTRAP_RECONCILE') === 'true',
    },
    adminSharedSecret: read('ADMIN_SHARED_SECRET') || undefined,
  };
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw !== undefined && raw.trim() !== '' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  const items = (raw ?? '').split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  return items.length > 0 ? items : fallback;
}

/** "1,2,4,8,16" → [1, 2, 4, 8, 16]; any invalid entry discards the whole value. */
function parseSchedule(raw: string | undefined): number[] {
  const entries = parseList(raw, []).map(Number);
  if (entries.length === 0 || entries.some((n) => !Number.isFinite(n) || n <= 0)) {
    return [...DEFAULT_RETRY_SCHEDULE_MINUTES];
  }
  return entries;
}

function parseIntegrationMode(raw: string | undefined, isProd: boolean): IntegrationMode {
  const mode = raw?.toLowerCase();
  if (mode === 'http' || mode === 'fixture') return mode;
  return isProd ? 'http' : 'fixture';
}
