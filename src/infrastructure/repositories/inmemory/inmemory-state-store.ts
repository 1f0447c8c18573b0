/**
 * InMemoryStateStore: IStateStore over plain Maps.
 *
 * Transactions are serialized through the write gate. A transaction that
 * throws restores the snapshot taken when it started. Readers outside the
 * gate may observe uncommitted writes.
 */
import { Injectable } from '@nestjs/common';
import type { IStateStore, StateRepositories } from '../../../domain/repositories/state-store.interface';
import { createWriteGate, passThrough, type WriteGuard } from '../write-gate';
import { cloneTables, createTables, restoreTables, type InMemoryTables } from './inmemory-tables';
import { InMemoryUserRepository } from './inmemory-user.repository';
import { InMemoryTeamRepository } from './inmemory-team.repository';
import { InMemoryMembershipRepository } from './inmemory-membership.repository';

@Injectable()
export class InMemoryStateStore implements IStateStore {
  private readonly tables: InMemoryTables = createTables();
  private readonly gate: WriteGuard = createWriteGate();

  readonly users = new InMemoryUserRepository(this.tables, this.gate);
  readonly teams = new InMemoryTeamRepository(this.tables, this.gate);
  readonly memberships = new InMemoryMembershipRepository(this.tables, this.gate);

  private readonly txRepositories: StateRepositories = {
    users: new InMemoryUserRepository(this.tables, passThrough),
    teams: new InMemoryTeamRepository(this.tables, passThrough),
    memberships: new InMemoryMembershipRepository(this.tables, passThrough),
  };

  async transaction<T>(work: (tx: StateRepositories) => Promise<T>): Promise<T> {
    return this.gate(async () => {
      // Whole-store copy, O(rows) per transaction.
      const snapshot = cloneTables(this.tables);
      try {
        return await work(this.txRepositories);
      } catch (err) {
        restoreTables(this.tables, snapshot);
        throw err;
      }
    });
  }

  /** Clear all data: useful in test teardowns. */
  clear(): void {
    restoreTables(this.tables, createTables());
  }
}
