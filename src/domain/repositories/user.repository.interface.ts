/**
 * IUserRepository: persistence port for mirrored directory users.
 *
 * Implementations:
 *   - SqliteUserRepository   (better-sqlite3)
 *   - InMemoryUserRepository (testing / lightweight deployments)
 */
import type { UserRecord, UserUpdateInput } from '../models/user.model';

export interface IUserRepository {
  /** Insert or fully replace a user. */
  save(user: UserRecord): Promise<UserRecord>;

  findByUsername(username: string): Promise<UserRecord | null>;

  findByEmployeeId(employeeId: string): Promise<UserRecord | null>;

  /** All users, optionally restricted by the active flag, ordered by username. */
  findAll(filter?: { active?: boolean }): Promise<UserRecord[]>;

  /** Users whose managerUsername equals the given username. */
  findDirectReports(managerUsername: string): Promise<UserRecord[]>;

  /**
   * Patch a user.
   * @throws NotFoundError if the user does not exist.
   */
  update(username: string, data: UserUpdateInput): Promise<UserRecord>;

  count(): Promise<number>;

  deleteAll(): Promise<void>;
}
