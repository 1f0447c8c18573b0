import { Inject, Injectable } from '@nestjs/common';

import { CLOCK, isoDate, type Clock } from '../../common/clock';
import { NotFoundError } from '../../domain/errors';
import type { DesiredConfiguration } from '../../domain/models/desired-configuration.model';
import { isMembershipActive, type MembershipWithTeam } from '../../domain/models/team.model';
import type { UserRecord } from '../../domain/models/user.model';
import type { IStateStore, StateRepositories } from '../../domain/repositories/state-store.interface';
import { STATE_STORE } from '../../domain/repositories/repository.tokens';
import { SyncLogger } from '../logging/sync-logger.service';
import { LogCategory } from '../logging/log-levels';
import { evaluateRules, type RuleInputs } from './compliance-rules';

const NO_MEMBERS: ReadonlySet<string> = new Set();

/**
 * ComplianceRulesService: loads rule inputs from the state store.
 *
 * `calculate` always reads current state; pass the transaction's
 * repositories to see uncommitted changes. `calculateAll` builds one
 * snapshot index for the whole pass and drops it when done.
 */
@Injectable()
export class ComplianceRulesService {
  constructor(
    @Inject(STATE_STORE) private readonly store: IStateStore,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly logger: SyncLogger,
  ) {}

  async calculate(username: string, repos: StateRepositories = this.store): Promise<DesiredConfiguration> {
    const user = await repos.users.findByUsername(username);
    if (!user) throw new NotFoundError('user', username);

    const today = isoDate(this.clock.now());
    const directReports = await repos.users.findDirectReports(username);
    const memberships = (await repos.memberships.findByUsername(username)).filter((m) => isActive(m, today));

    const teamMembers = new Map<number, ReadonlySet<string>>();
    if (memberships.length > 1) {
      for (const m of memberships) {
        const rows = await repos.memberships.findByTeam(m.teamId);
        teamMembers.set(m.teamId, new Set(rows.filter((r) => isMembershipActive(r, today)).map((r) => r.username)));
      }
    }

    return this.evaluate({
      user,
      directReports,
      memberships,
      teamMembers: (teamId) => teamMembers.get(teamId) ?? NO_MEMBERS,
    });
  }

  /** Desired configuration of every user matching the filter, keyed by username. */
  async calculateAll(filter: { active?: boolean } = {}): Promise<Map<string, DesiredConfiguration>> {
    const today = isoDate(this.clock.now());
    const [allUsers, teams, memberships] = await Promise.all([
      this.store.users.findAll(),
      this.store.teams.findAll(),
      this.store.memberships.findAll(),
    ]);

    const teamsById = new Map(teams.map((t) => [t.teamId, t]));
    const reportsByManager = new Map<string, UserRecord[]>();
    const membershipsByUser = new Map<string, MembershipWithTeam[]>();
    const membersByTeam = new Map<number, Set<string>>();

    for (const user of allUsers) {
      if (user.managerUsername) push(reportsByManager, user.managerUsername, user);
    }
    for (const m of memberships) {
      const team = teamsById.get(m.teamId);
      if (!team) continue;
      const joined: MembershipWithTeam = { ...m, team };
      if (!isActive(joined, today)) continue;
      push(membershipsByUser, m.username, joined);
      const members = membersByTeam.get(m.teamId) ?? new Set<string>();
      members.add(m.username);
      membersByTeam.set(m.teamId, members);
    }

    const result = new Map<string, DesiredConfiguration>();
    for (const user of allUsers) {
      if (filter.active !== undefined && user.active !== filter.active) continue;
      result.set(
        user.username,
        this.evaluate({
          user,
          directReports: reportsByManager.get(user.username) ?? [],
          memberships: membershipsByUser.get(user.username) ?? [],
          teamMembers: (teamId) => membersByTeam.get(teamId) ?? NO_MEMBERS,
        }),
      );
    }

    this.logger.debug(LogCategory.RULES, 'Bulk calculation finished', { users: result.size });
    return result;
  }

  private evaluate(inputs: RuleInputs): DesiredConfiguration {
    const outcome = evaluateRules(inputs);
    this.logger.debug(LogCategory.RULES, 'Configuration calculated', {
      username: inputs.user.username,
      userType: outcome.userType,
      precedenceTeams: outcome.precedenceTeams,
      visibilityProfile: outcome.configuration.visibilityProfile,
    });
    return outcome.configuration;
  }
}

/** Memberships in deactivated teams confer nothing. */
function isActive(membership: MembershipWithTeam, today: string): boolean {
  return membership.team.active && isMembershipActive(membership, today);
}

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}
