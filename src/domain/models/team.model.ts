/**
 * Domain models for registry teams and the user/team membership join.
 */

/** Team types that take part in multi-team precedence, highest first. */
export const PRECEDENCE_TEAM_TYPES = ['VTM', 'HTM', 'SFA'] as const;

export type PrecedenceTeamType = (typeof PRECEDENCE_TEAM_TYPES)[number];

/** The registry also knows other types (e.g. ACM); they carry no precedence. */
export type TeamType = PrecedenceTeamType | (string & {});

export interface TeamRecord {
  teamId: number;
  name: string;
  teamType: TeamType;
  active: boolean;
}

export interface MembershipRecord {
  username: string;
  teamId: number;
  role: string | null;
  /** ISO calendar date (YYYY-MM-DD). */
  effectiveStartDate: string | null;
  /** ISO calendar date (YYYY-MM-DD); a past date makes the membership inactive. */
  effectiveEndDate: string | null;
}

export interface MembershipWithTeam extends MembershipRecord {
  team: TeamRecord;
}

/** A membership is active until the day after its end date. */
export function isMembershipActive(membership: MembershipRecord, today: string): boolean {
  return membership.effectiveEndDate === null || membership.effectiveEndDate >= today;
}
