import type { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import * as path from 'path';

export const E2E_SECRET = 'test-secret';

/**
 * Bootstraps the full application for E2E testing.
 *
 * - In-memory state store and fixture collaborators (FIXTURE_PATH → repo fixtures/)
 * - Startup bootstrap seeds the store; the daily cron is off
 * - Same global prefix as main.ts
 *
 * The environment must be in place before AppModule is loaded, because the
 * repository and integration modules pick their providers at import time.
 * Call `app.close()` in your `afterAll()` to shut down cleanly.
 */
export async function createTestApp(env: Record<string, string> = {}): Promise<INestApplication> {
  Object.assign(process.env, {
    NODE_ENV: 'test',
    PERSISTENCE_BACKEND: 'inmemory',
    INTEGRATION_MODE: 'fixture',
    FIXTURE_PATH: path.resolve(__dirname, '..', '..', '..', 'fixtures'),
    ADMIN_SHARED_SECRET: E2E_SECRET,
    RECONCILIATION_ENABLED: 'false',
    LOG_LEVEL: 'WARN',
    ...env,
  });

  const { AppModule } = await import('../../../src/modules/app/app.module');
  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication();
  app.setGlobalPrefix('api');

  await app.init();
  return app;
}
