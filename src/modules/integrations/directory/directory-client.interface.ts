/**
 * IDirectoryClient: read-only port onto the personnel directory.
 *
 * Implementations:
 *   - HttpDirectoryClient    (paged REST gateway)
 *   - FixtureDirectoryClient (JSON export on disk)
 */
import type { UserRecord } from '../../../domain/models/user.model';

export interface IDirectoryClient {
  /** Every user in the directory, bounded by the client's hard cap. */
  fetchAllUsers(): Promise<UserRecord[]>;

  fetchUserByUsername(username: string): Promise<UserRecord | null>;
}

export const DIRECTORY_CLIENT = 'DIRECTORY_CLIENT';
