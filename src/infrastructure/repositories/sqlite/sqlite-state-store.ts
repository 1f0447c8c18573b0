/**
 * SqliteStateStore: IStateStore over a single better-sqlite3 connection.
 *
 * better-sqlite3 is synchronous, so an async unit of work cannot use
 * `db.transaction()`. Transactions are opened with BEGIN IMMEDIATE instead,
 * and the write gate keeps any other write off the connection until
 * COMMIT or ROLLBACK. Reads are not gated: they share the connection, so a
 * read issued while a transaction is open sees its uncommitted rows.
 */
import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import type { IStateStore, StateRepositories } from '../../../domain/repositories/state-store.interface';
import { SYNC_CONFIG, type SyncConfig } from '../../../modules/config/sync-config';
import { createWriteGate, passThrough, type WriteGuard } from '../write-gate';
import { SQLITE_SCHEMA } from './sqlite-schema';
import { SqliteUserRepository } from './sqlite-user.repository';
import { SqliteTeamRepository } from './sqlite-team.repository';
import { SqliteMembershipRepository } from './sqlite-membership.repository';

const IN_MEMORY = ':memory:';

@Injectable()
export class SqliteStateStore implements IStateStore, OnModuleDestroy {
  private readonly db: BetterSqlite3.Database;
  private readonly gate: WriteGuard = createWriteGate();

  readonly users: SqliteUserRepository;
  readonly teams: SqliteTeamRepository;
  readonly memberships: SqliteMembershipRepository;
  private readonly txRepositories: StateRepositories;

  constructor(@Inject(SYNC_CONFIG) config: Pick<SyncConfig, 'databasePath'>) {
    if (config.databasePath !== IN_MEMORY) {
      mkdirSync(dirname(config.databasePath), { recursive: true });
    }
    this.db = new BetterSqlite3(config.databasePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SQLITE_SCHEMA);

    this.users = new SqliteUserRepository(this.db, this.gate);
    this.teams = new SqliteTeamRepository(this.db, this.gate);
    this.memberships = new SqliteMembershipRepository(this.db, this.gate);
    this.txRepositories = {
      users: new SqliteUserRepository(this.db, passThrough),
      teams: new SqliteTeamRepository(this.db, passThrough),
      memberships: new SqliteMembershipRepository(this.db, passThrough),
    };
  }

  async transaction<T>(work: (tx: StateRepositories) => Promise<T>): Promise<T> {
    return this.gate(async () => {
      this.db.exec('BEGIN IMMEDIATE');
      try {
        const result = await work(this.txRepositories);
        this.db.exec('COMMIT');
        return result;
      } catch (err) {
        if (this.db.inTransaction) {
          this.db.exec('ROLLBACK');
        }
        throw err;
      }
    });
  }

  onModuleDestroy(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
