import { join } from 'node:path';

import { DEFAULT_RECONCILIATION_CRON, buildSyncConfig, envReader } from './sync-config';

describe('buildSyncConfig', () => {
  const build = (env: Record<string, string | undefined>) => buildSyncConfig(envReader(env));

  it('should apply defaults for an empty environment', () => {
    const config = build({});

    expect(config.persistenceBackend).toBe('sqlite');
    expect(config.databasePath).toBe(join(process.cwd(), 'data', 'access-sync.db'));
    expect(config.integrationMode).toBe('fixture');
    expect(config.vendor.rateLimit).toEqual({ permits: 20, periodMs: 60_000, timeoutMs: 2_000 });
    expect(config.vendor.circuitBreaker).toEqual({
      windowSize: 5,
      minimumCalls: 3,
      failureRateThreshold: 50,
      openDurationMs: 60_000,
      halfOpenMaxCalls: 1,
    });
    expect(config.vendor.retryScheduleMinutes).toEqual([1, 2, 4, 8, 16]);
    expect(config.events).toEqual({ workerConcurrency: 4, backlogLimit: 10_000, managementRoles: ['LEAD'] });
    expect(config.reconciliation).toEqual({ cron: DEFAULT_RECONCILIATION_CRON, enabled: true });
    expect(config.bootstrap).toEqual({ onStartup: true, reconcileAfter: false });
    expect(config.adminSharedSecret).toBeUndefined();
  });

  it('should default to http collaborators in production', () => {
    expect(build({ NODE_ENV: 'production' }).integrationMode).toBe('http');
    expect(build({ NODE_ENV: 'production', INTEGRATION_MODE: 'FIXTURE' }).integrationMode).toBe('fixture');
  });

  it('should read numeric settings and fall back on invalid ones', () => {
    const config = build({
      VENDOR_RATE_LIMIT_PERMITS: '5',
      VENDOR_RATE_LIMIT_PERIOD_MS: 'soon',
      VENDOR_CB_WINDOW_SIZE: '-3',
      VENDOR_CB_OPEN_DURATION_MS: '1.5',
      EVENT_WORKER_CONCURRENCY: ' ',
    });

    expect(config.vendor.rateLimit.permits).toBe(5);
    expect(config.vendor.rateLimit.periodMs).toBe(60_000);
    expect(config.vendor.circuitBreaker.windowSize).toBe(5);
    expect(config.vendor.circuitBreaker.openDurationMs).toBe(60_000);
    expect(config.events.workerConcurrency).toBe(4);
  });

  it('should parse the retry schedule and reject it whole when any entry is invalid', () => {
    expect(build({ VENDOR_RETRY_SCHEDULE_MINUTES: '0.5, 1, 3' }).vendor.retryScheduleMinutes).toEqual([0.5, 1, 3]);
    expect(build({ VENDOR_RETRY_SCHEDULE_MINUTES: '1,x,3' }).vendor.retryScheduleMinutes).toEqual([1, 2, 4, 8, 16]);
  });

  it('should uppercase management roles', () => {
    expect(build({ MANAGEMENT_ROLES: 'lead, Coach' }).events.managementRoles).toEqual(['LEAD', 'COACH']);
  });

  it('should read switches and secrets', () => {
    const config = build({
      PERSISTENCE_BACKEND: 'InMemory',
      RECONCILIATION_ENABLED: 'false',
      RECONCILIATION_CRON: '*/10 * * * *',
      BOOTSTRAP_ON_STARTUP: 'false',
      BOOTSTRAP_RECONCILE: 'true',
      ADMIN_SHARED_SECRET: 'test-secret',
      VENDOR_API_TOKEN: '',
    });

    expect(config.persistenceBackend).toBe('inmemory');
    expect(config.reconciliation).toEqual({ cron: '*/10 * * * *', enabled: false });
    expect(config.bootstrap).toEqual({ onStartup: false, reconcileAfter: true });
    expect(config.adminSharedSecret).toBe('test-secret');
    expect(config.vendor.apiToken).toBeUndefined();
  });
});
