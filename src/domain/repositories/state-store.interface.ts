/**
 * IStateStore: the mirrored local state as one unit of work.
 *
 * The top-level repositories serialize each write on their own. Work passed
 * to `transaction()` runs exclusively against the `tx` repositories and is
 * committed as a whole, or rolled back if it throws.
 */
import type { IUserRepository } from './user.repository.interface';
import type { ITeamRepository } from './team.repository.interface';
import type { IMembershipRepository } from './membership.repository.interface';

export interface StateRepositories {
  readonly users: IUserRepository;
  readonly teams: ITeamRepository;
  readonly memberships: IMembershipRepository;
}

export interface IStateStore extends StateRepositories {
  transaction<T>(work: (tx: StateRepositories) => Promise<T>): Promise<T>;
}
