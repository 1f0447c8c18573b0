/**
 * Desired-configuration rules.
 *
 * A pure function of the user, their direct reports, their active
 * memberships and the members of those teams. Callers load the inputs
 * (one user at a time or from a bulk index) and this module never reads
 * the store itself.
 */
import type { DesiredConfiguration } from '../../domain/models/desired-configuration.model';
import { PRECEDENCE_TEAM_TYPES, type MembershipWithTeam, type TeamRecord } from '../../domain/models/team.model';
import type { UserRecord } from '../../domain/models/user.model';
import { classifyUser, isHomeOffice, UserType } from './user-classification';
import { submitterGroup } from './submitter-groups';

export const DEFAULT_PROFILE = 'Default-Profile';
export const BRANCH_DEFAULT_PROFILE = 'Vis_Branch_Default';

export interface RuleInputs {
  user: UserRecord;
  directReports: readonly UserRecord[];
  /** Active memberships only. */
  memberships: readonly MembershipWithTeam[];
  /** Usernames holding an active membership in the team. */
  teamMembers: (teamId: number) => ReadonlySet<string>;
}

export interface RuleOutcome {
  userType: UserType;
  /** Set when the multi-team precedence path produced the result. */
  precedenceTeams?: string[];
  configuration: DesiredConfiguration;
}

/** Spaces become underscores; dots are dropped. */
export function sanitizeName(value: string): string {
  return value.replace(/ /g, '_').replace(/\./g, '');
}

export function evaluateRules(inputs: RuleInputs): RuleOutcome {
  const { user } = inputs;
  const userType = classifyUser(user, inputs.directReports.length > 0);

  if (inputs.memberships.length > 1) {
    const teams = selectPrecedenceTeams(inputs.memberships, inputs.teamMembers);
    if (teams.length > 0) {
      const groupName = sanitizeName(
        teams
          .map((t) => t.name)
          .sort()
          .join('_'),
      );
      return {
        userType,
        precedenceTeams: teams.map((t) => t.name).sort(),
        configuration: build(user, `Vis_${groupName}`, [groupName, submitterGroup(user.country, 'BR')]),
      };
    }
  }

  return { userType, configuration: standardConfiguration(userType, inputs) };
}

/**
 * VTM teams are always taken and their members are covered. HTM and then
 * SFA teams are taken only if they have a member outside that VTM coverage.
 */
export function selectPrecedenceTeams(
  memberships: readonly MembershipWithTeam[],
  teamMembers: (teamId: number) => ReadonlySet<string>,
): TeamRecord[] {
  const selected: TeamRecord[] = [];
  const covered = new Set<string>();

  for (const type of PRECEDENCE_TEAM_TYPES) {
    const candidates = memberships
      .map((m) => m.team)
      .filter((team) => team.teamType === type)
      .sort((a, b) => a.teamId - b.teamId);

    for (const team of candidates) {
      const members = teamMembers(team.teamId);
      const include = type === 'VTM' || [...members].some((member) => !covered.has(member));
      if (!include) continue;
      selected.push(team);
      if (type === 'VTM') members.forEach((member) => covered.add(member));
    }
  }
  return selected;
}

function standardConfiguration(userType: UserType, inputs: RuleInputs): DesiredConfiguration {
  const { user } = inputs;

  switch (userType) {
    case UserType.HO_LEADER: {
      const suffix = `${user.firstName}_${user.lastName}_(${user.username})`;
      const reportGroups = inputs.directReports
        .filter((report) => report.country)
        .map((report) => sanitizeName(`${report.country}_${isHomeOffice(report) ? 'HO' : 'BR'}_${suffix}`));
      return build(user, sanitizeName(`Vis_HO_${suffix}`), [...reportGroups, submitterGroup(user.country, 'HO')]);
    }

    case UserType.BR_TEAM: {
      const teamGroups = inputs.memberships
        .map((m) => sanitizeName([user.country, m.team.name, m.team.teamType].filter(Boolean).join('-')))
        .sort();
      const profile = teamGroups.length > 0 ? `Vis_${teamGroups[teamGroups.length - 1]}` : BRANCH_DEFAULT_PROFILE;
      return build(user, profile, [...teamGroups, submitterGroup(user.country, 'BR')]);
    }

    case UserType.HO:
    case UserType.BR:
    case UserType.HOBR: {
      if (!user.country) return build(user, DEFAULT_PROFILE, []);
      const suffix = userType === UserType.HOBR ? 'HO-BR' : userType;
      const groups =
        userType === UserType.HOBR
          ? [submitterGroup(user.country, 'HO'), submitterGroup(user.country, 'BR')]
          : [submitterGroup(user.country, userType)];
      return build(user, `Vis-${user.country}-${suffix}`, groups);
    }

    case UserType.UNSPECIFIED:
      return build(user, DEFAULT_PROFILE, []);
  }
}

function build(user: UserRecord, visibilityProfile: string, groups: Array<string | null>): DesiredConfiguration {
  return {
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    visibilityProfile,
    groups: new Set(groups.filter((g): g is string => g !== null)),
    active: user.active,
  };
}
