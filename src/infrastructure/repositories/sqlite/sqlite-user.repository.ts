/**
 * SqliteUserRepository: IUserRepository over a better-sqlite3 connection.
 */
import type BetterSqlite3 from 'better-sqlite3';
import type { IUserRepository } from '../../../domain/repositories/user.repository.interface';
import type { UserRecord, UserUpdateInput } from '../../../domain/models/user.model';
import { NotFoundError } from '../../../domain/errors';
import type { WriteGuard } from '../write-gate';
import type { UserRow } from './sqlite-schema';

interface UserParams {
  username: string;
  employee_id: string | null;
  first_name: string;
  last_name: string;
  title: string | null;
  distinguished_name: string | null;
  country: string | null;
  manager_username: string | null;
  active: number;
}

const toRecord = (row: UserRow): UserRecord => ({
  username: row.username,
  employeeId: row.employee_id,
  firstName: row.first_name,
  lastName: row.last_name,
  title: row.title,
  distinguishedName: row.distinguished_name,
  country: row.country,
  managerUsername: row.manager_username,
  active: row.active === 1,
});

const toParams = (user: UserRecord): UserParams => ({
  username: user.username,
  employee_id: user.employeeId,
  first_name: user.firstName,
  last_name: user.lastName,
  title: user.title,
  distinguished_name: user.distinguishedName,
  country: user.country,
  manager_username: user.managerUsername,
  active: user.active ? 1 : 0,
});

export class SqliteUserRepository implements IUserRepository {
  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly guard: WriteGuard,
  ) {}

  async save(user: UserRecord): Promise<UserRecord> {
    return this.guard(async () => {
      this.db
        .prepare<UserParams>(
          `INSERT INTO users (username, employee_id, first_name, last_name, title, distinguished_name, country, manager_username, active)
           VALUES (@username, @employee_id, @first_name, @last_name, @title, @distinguished_name, @country, @manager_username, @active)
           ON CONFLICT(username) DO UPDATE SET
             employee_id = excluded.employee_id,
             first_name = excluded.first_name,
             last_name = excluded.last_name,
             title = excluded.title,
             distinguished_name = excluded.distinguished_name,
             country = excluded.country,
             manager_username = excluded.manager_username,
             active = excluded.active`,
        )
        .run(toParams(user));
      return { ...user };
    });
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?').get(username);
    return row ? toRecord(row) : null;
  }

  async findByEmployeeId(employeeId: string): Promise<UserRecord | null> {
    const row = this.db
      .prepare<[string], UserRow>('SELECT * FROM users WHERE employee_id = ? ORDER BY username LIMIT 1')
      .get(employeeId);
    return row ? toRecord(row) : null;
  }

  async findAll(filter?: { active?: boolean }): Promise<UserRecord[]> {
    if (filter?.active === undefined) {
      return this.db.prepare<[], UserRow>('SELECT * FROM users ORDER BY username').all().map(toRecord);
    }
    return this.db
      .prepare<[number], UserRow>('SELECT * FROM users WHERE active = ? ORDER BY username')
      .all(filter.active ? 1 : 0)
      .map(toRecord);
  }

  async findDirectReports(managerUsername: string): Promise<UserRecord[]> {
    return this.db
      .prepare<[string], UserRow>(
        'SELECT * FROM users WHERE manager_username = ? AND username <> manager_username ORDER BY username',
      )
      .all(managerUsername)
      .map(toRecord);
  }

  async update(username: string, data: UserUpdateInput): Promise<UserRecord> {
    return this.guard(async () => {
      const existing = await this.findByUsername(username);
      if (!existing) {
        throw new NotFoundError('user', username);
      }
      const updated: UserRecord = { ...existing, ...data, username };
      this.db
        .prepare<UserParams>(
          `UPDATE users SET
             employee_id = @employee_id,
             first_name = @first_name,
             last_name = @last_name,
             title = @title,
             distinguished_name = @distinguished_name,
             country = @country,
             manager_username = @manager_username,
             active = @active
           WHERE username = @username`,
        )
        .run(toParams(updated));
      return updated;
    });
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM users').get();
    return row?.total ?? 0;
  }

  async deleteAll(): Promise<void> {
    await this.guard(async () => {
      this.db.prepare('DELETE FROM users').run();
    });
  }
}
