import { Inject, Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import { CLOCK, isoDate, type Clock } from '../../common/clock';
import { DataIntegrityWarning } from '../../domain/errors';
import type { UserRecord } from '../../domain/models/user.model';
import type { IStateStore, StateRepositories } from '../../domain/repositories/state-store.interface';
import { STATE_STORE } from '../../domain/repositories/repository.tokens';
import { BRANCH_MARKER } from '../compliance/user-classification';
import { SYNC_CONFIG, type SyncConfig } from '../config/sync-config';
import { DIRECTORY_CLIENT, type IDirectoryClient } from '../integrations/directory/directory-client.interface';
import {
  TEAM_REGISTRY_CLIENT,
  type ITeamRegistryClient,
  type TeamWithMembers,
} from '../integrations/team-registry/team-registry-client.interface';
import { SyncLogger } from '../logging/sync-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ReconciliationService, type ReconciliationSummary } from '../reconciliation/reconciliation.service';

export type BootstrapTrigger = 'startup' | 'admin';

export interface BootstrapSummary {
  trigger: BootstrapTrigger;
  users: number;
  teams: number;
  memberships: number;
  droppedManagerRefs: number;
  skippedMemberships: number;
  durationMs: number;
  reconciliation?: ReconciliationSummary;
}

interface SourceData {
  users: UserRecord[];
  teams: TeamWithMembers[];
}

/**
 * Seeds the state store from the directory and the team registry.
 *
 * Everything is fetched first; any fetch failure aborts the run before the
 * store is touched. Persistence is one transaction that wipes the store and
 * inserts users in two passes (manager references after every user exists),
 * then teams, then the memberships that resolve.
 */
@Injectable()
export class BootstrapService implements OnApplicationBootstrap {
  private running = false;

  constructor(
    @Inject(STATE_STORE) private readonly store: IStateStore,
    @Inject(DIRECTORY_CLIENT) private readonly directory: IDirectoryClient,
    @Inject(TEAM_REGISTRY_CLIENT) private readonly registry: ITeamRegistryClient,
    private readonly reconciliation: ReconciliationService,
    @Inject(SYNC_CONFIG) private readonly config: Pick<SyncConfig, 'bootstrap'>,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly logger: SyncLogger,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.bootstrap.onStartup) {
      this.logger.info(LogCategory.BOOTSTRAP, 'Startup bootstrap disabled');
      return;
    }
    const existing = await this.store.users.count();
    if (existing > 0) {
      this.logger.info(LogCategory.BOOTSTRAP, 'State store already seeded, bootstrap skipped', { users: existing });
      return;
    }
    try {
      await this.run('startup');
    } catch (error: unknown) {
      this.logger.fatal(LogCategory.BOOTSTRAP, 'Bootstrap failed, refusing to start', error);
      throw error;
    }
  }

  async run(trigger: BootstrapTrigger): Promise<BootstrapSummary> {
    if (this.running) {
      throw new Error('Bootstrap already running');
    }
    this.running = true;
    try {
      return await this.logger.runWithContext(
        { correlationId: randomUUID(), source: `bootstrap-${trigger}`, startTime: Date.now() },
        () => this.execute(trigger),
      );
    } finally {
      this.running = false;
    }
  }

  private async execute(trigger: BootstrapTrigger): Promise<BootstrapSummary> {
    const startedAt = Date.now();
    this.logger.info(LogCategory.BOOTSTRAP, 'Bootstrap started', { trigger });

    const source = await this.fetchSourceData();
    const summary = await this.store.transaction((tx) => this.persist(tx, source, trigger));
    summary.durationMs = Date.now() - startedAt;
    this.logger.info(LogCategory.BOOTSTRAP, 'Bootstrap finished', { ...summary });

    if (this.config.bootstrap.reconcileAfter) {
      try {
        summary.reconciliation = await this.reconciliation.runDailyTrueUp();
      } catch (error: unknown) {
        this.logger.error(LogCategory.BOOTSTRAP, 'Post-bootstrap reconciliation failed', error);
      }
    }
    return summary;
  }

  private async fetchSourceData(): Promise<SourceData> {
    const users = await this.directory.fetchAllUsers();

    const managers = new Set(users.map((u) => u.managerUsername).filter((m): m is string => m !== null));
    const leaders = users.filter((u) => managers.has(u.username) && (u.distinguishedName?.includes(BRANCH_MARKER) ?? false));

    const teamIds = new Set<number>();
    for (const leader of leaders) {
      const summaries = await this.registry.fetchTeamsForLeader(leader.username);
      summaries.forEach((t) => teamIds.add(t.teamId));
    }

    const teams: TeamWithMembers[] = [];
    for (const teamId of teamIds) {
      const team = await this.registry.fetchTeamDetails(teamId);
      if (team) teams.push(team);
      else this.logger.warn(LogCategory.BOOTSTRAP, 'Team listed for a leader but unknown to the registry', { teamId });
    }

    this.logger.info(LogCategory.BOOTSTRAP, 'Source data fetched', {
      users: users.length,
      branchLeaders: leaders.length,
      teams: teams.length,
    });
    return { users, teams };
  }

  private async persist(tx: StateRepositories, source: SourceData, trigger: BootstrapTrigger): Promise<BootstrapSummary> {
    const summary: BootstrapSummary = {
      trigger,
      users: 0,
      teams: 0,
      memberships: 0,
      droppedManagerRefs: 0,
      skippedMemberships: 0,
      durationMs: 0,
    };

    await tx.memberships.deleteAll();
    await tx.teams.deleteAll();
    await tx.users.deleteAll();

    const byUsername = new Map(source.users.map((u) => [u.username, u]));
    for (const user of byUsername.values()) {
      await tx.users.save({ ...user, managerUsername: null });
    }
    summary.users = byUsername.size;

    for (const user of byUsername.values()) {
      const manager = user.managerUsername;
      if (manager === null) continue;
      if (manager !== user.username && byUsername.has(manager)) {
        await tx.users.update(user.username, { managerUsername: manager });
      } else {
        summary.droppedManagerRefs++;
        this.warn(new DataIntegrityWarning('Manager reference dropped', { username: user.username, managerUsername: manager }));
      }
    }

    const today = isoDate(this.clock.now());
    for (const team of source.teams) {
      await tx.teams.save({
        teamId: team.teamId,
        name: team.name,
        teamType: team.teamType,
        active: team.effectiveEndDate === null || team.effectiveEndDate >= today,
      });
      summary.teams++;
    }

    const usernameByEmployeeId = new Map<string, string>();
    byUsername.forEach((u) => {
      if (u.employeeId) usernameByEmployeeId.set(u.employeeId, u.username);
    });

    for (const team of source.teams) {
      for (const member of team.members) {
        const username = usernameByEmployeeId.get(member.employeeId);
        if (!username) {
          summary.skippedMemberships++;
          this.warn(
            new DataIntegrityWarning('Membership skipped, employee not in directory', {
              teamId: team.teamId,
              employeeId: member.employeeId,
            }),
          );
          continue;
        }
        await tx.memberships.upsert({
          username,
          teamId: team.teamId,
          role: member.role,
          effectiveStartDate: member.effectiveStartDate,
          effectiveEndDate: member.effectiveEndDate,
        });
        summary.memberships++;
      }
    }
    return summary;
  }

  private warn(warning: DataIntegrityWarning): void {
    this.logger.warn(LogCategory.BOOTSTRAP, warning.message, warning.details);
  }
}
