/**
 * IMembershipRepository: persistence port for the user/team join.
 *
 * Memberships are keyed by (username, teamId). Implementations must not
 * accept a membership whose user or team is missing.
 */
import type { MembershipRecord, MembershipWithTeam } from '../models/team.model';

export interface IMembershipRepository {
  /**
   * Insert or replace the membership for (username, teamId).
   * @throws NotFoundError if the user or the team does not exist.
   */
  upsert(membership: MembershipRecord): Promise<MembershipRecord>;

  find(username: string, teamId: number): Promise<MembershipRecord | null>;

  /** Memberships of a user joined with their team, ordered by teamId. */
  findByUsername(username: string): Promise<MembershipWithTeam[]>;

  /** Memberships of a team, ordered by username. */
  findByTeam(teamId: number): Promise<MembershipRecord[]>;

  findAll(): Promise<MembershipRecord[]>;

  /** @returns true if a membership was removed. */
  delete(username: string, teamId: number): Promise<boolean>;

  /** Remove every membership of a team and return the removed rows. */
  deleteByTeam(teamId: number): Promise<MembershipRecord[]>;

  deleteAll(): Promise<void>;
}
