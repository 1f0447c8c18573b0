/**
 * InMemoryUserRepository: IUserRepository backed by the store's user Map.
 * Records are copied on the way in and out.
 */
import type { IUserRepository } from '../../../domain/repositories/user.repository.interface';
import type { UserRecord, UserUpdateInput } from '../../../domain/models/user.model';
import { NotFoundError } from '../../../domain/errors';
import type { WriteGuard } from '../write-gate';
import type { InMemoryTables } from './inmemory-tables';

const byUsername = (a: UserRecord, b: UserRecord): number => a.username.localeCompare(b.username);

export class InMemoryUserRepository implements IUserRepository {
  constructor(
    private readonly tables: InMemoryTables,
    private readonly guard: WriteGuard,
  ) {}

  async save(user: UserRecord): Promise<UserRecord> {
    return this.guard(async () => {
      this.tables.users.set(user.username, { ...user });
      return { ...user };
    });
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const user = this.tables.users.get(username);
    return user ? { ...user } : null;
  }

  async findByEmployeeId(employeeId: string): Promise<UserRecord | null> {
    for (const user of this.tables.users.values()) {
      if (user.employeeId === employeeId) return { ...user };
    }
    return null;
  }

  async findAll(filter?: { active?: boolean }): Promise<UserRecord[]> {
    return Array.from(this.tables.users.values())
      .filter((u) => filter?.active === undefined || u.active === filter.active)
      .sort(byUsername)
      .map((u) => ({ ...u }));
  }

  async findDirectReports(managerUsername: string): Promise<UserRecord[]> {
    return Array.from(this.tables.users.values())
      .filter((u) => u.managerUsername === managerUsername && u.username !== managerUsername)
      .sort(byUsername)
      .map((u) => ({ ...u }));
  }

  async update(username: string, data: UserUpdateInput): Promise<UserRecord> {
    return this.guard(async () => {
      const existing = this.tables.users.get(username);
      if (!existing) {
        throw new NotFoundError('user', username);
      }
      const updated: UserRecord = { ...existing, ...data, username };
      this.tables.users.set(username, updated);
      return { ...updated };
    });
  }

  async count(): Promise<number> {
    return this.tables.users.size;
  }

  async deleteAll(): Promise<void> {
    await this.guard(async () => {
      this.tables.users.clear();
    });
  }
}
