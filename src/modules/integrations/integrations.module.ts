/**
 * IntegrationsModule: dynamic module that provides the collaborator ports.
 *
 * Selects the implementation set via INTEGRATION_MODE:
 *   - "http"    → HttpDirectoryClient / HttpTeamRegistryClient / HttpVendorTransport
 *   - "fixture" → JSON fixtures under FIXTURE_PATH and an in-memory vendor
 * Defaults to "http" in production and "fixture" elsewhere.
 *
 * Usage:
 *   imports: [IntegrationsModule.register()]
 */
import { Module, type DynamicModule, type Provider } from '@nestjs/common';

import { buildSyncConfig } from '../config/sync-config';
import { DIRECTORY_CLIENT } from './directory/directory-client.interface';
import { HttpDirectoryClient } from './directory/http-directory.client';
import { FixtureDirectoryClient } from './directory/fixture-directory.client';
import { TEAM_REGISTRY_CLIENT } from './team-registry/team-registry-client.interface';
import { HttpTeamRegistryClient } from './team-registry/http-team-registry.client';
import { FixtureTeamRegistryClient } from './team-registry/fixture-team-registry.client';
import { VENDOR_TRANSPORT } from './vendor/vendor-transport.interface';
import { HttpVendorTransport } from './vendor/http-vendor.transport';
import { InMemoryVendorTransport } from './vendor/inmemory-vendor.transport';

const TOKENS = [DIRECTORY_CLIENT, TEAM_REGISTRY_CLIENT, VENDOR_TRANSPORT];

@Module({})
export class IntegrationsModule {
  static register(): DynamicModule {
    const mode = buildSyncConfig().integrationMode;

    const providers: Provider[] =
      mode === 'http'
        ? [
            { provide: DIRECTORY_CLIENT, useClass: HttpDirectoryClient },
            { provide: TEAM_REGISTRY_CLIENT, useClass: HttpTeamRegistryClient },
            { provide: VENDOR_TRANSPORT, useClass: HttpVendorTransport },
          ]
        : [
            { provide: DIRECTORY_CLIENT, useClass: FixtureDirectoryClient },
            { provide: TEAM_REGISTRY_CLIENT, useClass: FixtureTeamRegistryClient },
            { provide: VENDOR_TRANSPORT, useClass: InMemoryVendorTransport },
          ];

    return {
      module: IntegrationsModule,
      global: true,
      providers,
      exports: TOKENS,
    };
  }
}
