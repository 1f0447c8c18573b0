/**
 * ITeamRepository: persistence port for registry teams.
 */
import type { TeamRecord } from '../models/team.model';

export interface ITeamRepository {
  /** Insert or fully replace a team. */
  save(team: TeamRecord): Promise<TeamRecord>;

  findById(teamId: number): Promise<TeamRecord | null>;

  findAll(): Promise<TeamRecord[]>;

  /** @throws NotFoundError if the team does not exist. */
  setActive(teamId: number, active: boolean): Promise<TeamRecord>;

  deleteAll(): Promise<void>;
}
