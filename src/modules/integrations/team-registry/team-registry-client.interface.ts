/**
 * ITeamRegistryClient: lookup-style port onto the team registry.
 *
 * The registry cannot list all teams; discovery starts from a leader's
 * username. Members are identified by employeeId, not username.
 */
export interface TeamSummary {
  teamId: number;
  name: string;
  teamType: string;
}

export interface TeamMemberDetail {
  employeeId: string;
  role: string | null;
  effectiveStartDate: string | null;
  effectiveEndDate: string | null;
}

export interface TeamWithMembers extends TeamSummary {
  effectiveEndDate: string | null;
  members: TeamMemberDetail[];
}

export interface ITeamRegistryClient {
  fetchTeamsForLeader(username: string): Promise<TeamSummary[]>;

  /** Null when the registry does not know the team. */
  fetchTeamDetails(teamId: number): Promise<TeamWithMembers | null>;
}

export const TEAM_REGISTRY_CLIENT = 'TEAM_REGISTRY_CLIENT';
