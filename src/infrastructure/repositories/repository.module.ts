/**
 * RepositoryModule: dynamic module that provides the IStateStore.
 *
 * Selects the persistence backend via the PERSISTENCE_BACKEND environment variable:
 *   - "sqlite"   (default) → SqliteStateStore (DATABASE_PATH)
 *   - "inmemory"           → InMemoryStateStore
 *
 * Usage:
 *   imports: [RepositoryModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';
import { STATE_STORE } from '../../domain/repositories/repository.tokens';
import { SqliteStateStore } from './sqlite/sqlite-state-store';
import { InMemoryStateStore } from './inmemory/inmemory-state-store';

@Module({})
export class RepositoryModule {
  static register(): DynamicModule {
    const backend = (process.env.PERSISTENCE_BACKEND ?? 'sqlite').toLowerCase();

    if (backend === 'inmemory') {
      return {
        module: RepositoryModule,
        global: true,
        providers: [{ provide: STATE_STORE, useClass: InMemoryStateStore }],
        exports: [STATE_STORE],
      };
    }

    return {
      module: RepositoryModule,
      global: true,
      providers: [{ provide: STATE_STORE, useClass: SqliteStateStore }],
      exports: [STATE_STORE],
    };
  }
}
