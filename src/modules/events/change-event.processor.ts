import { Inject, Injectable } from '@nestjs/common';

import { CLOCK, isoDate, type Clock } from '../../common/clock';
import { DataIntegrityWarning, NotFoundError, PoisonMessageError } from '../../domain/errors';
import { configurationsEqual, type DesiredConfiguration } from '../../domain/models/desired-configuration.model';
import type { IStateStore, StateRepositories } from '../../domain/repositories/state-store.interface';
import { STATE_STORE } from '../../domain/repositories/repository.tokens';
import { SYNC_CONFIG, type SyncConfig } from '../config/sync-config';
import { ComplianceRulesService } from '../compliance/compliance-rules.service';
import { DIRECTORY_CLIENT, type IDirectoryClient } from '../integrations/directory/directory-client.interface';
import { SyncLogger } from '../logging/sync-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ResilienceMetricsService } from '../metrics/resilience-metrics.service';
import { VendorSyncService, type PushSummary } from '../vendor/vendor-sync.service';
import { PROPERTY_RULES, resolveProperty } from './directory-property-table';
import type { DirectoryChangeEvent, TeamChangeEvent, TeamMemberDelta } from './event-schemas';

export type EventAction =
  | 'terminated'
  | 'updated'
  | 'created'
  | 'team-deactivated'
  | 'members-changed'
  | 'ignored';

export interface ProcessingResult {
  action: EventAction;
  pushed: PushSummary;
}

/** Configurations computed inside the transaction, pushed after it commits. */
interface PendingPushes {
  action: EventAction;
  configs: DesiredConfiguration[];
}

const NOTHING_PUSHED: PushSummary = { sent: 0, retryScheduled: 0, failed: 0 };

/**
 * ChangeEventProcessor: applies one directory or team event.
 *
 * Each event mutates the store and reads its blast radius in a single
 * transaction. Vendor pushes happen only after that transaction commits,
 * so a vendor outage never rolls back local state.
 */
@Injectable()
export class ChangeEventProcessor {
  private readonly managementRoles: ReadonlySet<string>;

  constructor(
    @Inject(STATE_STORE) private readonly store: IStateStore,
    private readonly rules: ComplianceRulesService,
    private readonly vendorSync: VendorSyncService,
    @Inject(DIRECTORY_CLIENT) private readonly directory: IDirectoryClient,
    @Inject(SYNC_CONFIG) config: Pick<SyncConfig, 'events'>,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly logger: SyncLogger,
    private readonly metrics: ResilienceMetricsService,
  ) {
    this.managementRoles = new Set(config.events.managementRoles);
  }

  // ─── Directory events ─────────────────────────────────────────────

  async processDirectoryEvent(event: DirectoryChangeEvent): Promise<ProcessingResult> {
    const pending = await this.applyDirectoryEvent(event);
    return this.finish(pending, { username: event.username, changeType: event.changeType });
  }

  private applyDirectoryEvent(event: DirectoryChangeEvent): Promise<PendingPushes> {
    switch (event.changeType) {
      case 'TerminatedUser':
        return this.transaction((tx) => this.terminate(tx, event.username));
      case 'DataChange':
        return this.applyDataChange(event);
      case 'NewUser':
        return this.createUser(event.username);
    }
  }

  private async terminate(tx: StateRepositories, username: string): Promise<PendingPushes> {
    const user = await tx.users.findByUsername(username);
    if (!user) return this.ignoreUnknownUser(username);

    await tx.users.update(username, { active: false });
    return { action: 'terminated', configs: [await this.rules.calculate(username, tx)] };
  }

  private async applyDataChange(event: DirectoryChangeEvent): Promise<PendingPushes> {
    const property = event.property === null ? null : resolveProperty(event.property);
    if (property === null) {
      throw new PoisonMessageError(`Unknown directory property "${event.property ?? ''}"`, [
        `property: not one of ${Object.keys(PROPERTY_RULES).join(', ')}`,
      ]);
    }
    const rule = PROPERTY_RULES[property];

    return this.transaction(async (tx) => {
      const user = await tx.users.findByUsername(event.username);
      if (!user) return this.ignoreUnknownUser(event.username);

      const before = await this.rules.calculate(event.username, tx);
      const patch = rule.apply(event.newValue);
      if (patch.managerUsername) {
        patch.managerUsername = await this.resolveManager(tx, event.username, patch.managerUsername);
      }
      await tx.users.update(event.username, patch);

      const after = await this.rules.calculate(event.username, tx);
      const configs: DesiredConfiguration[] = [];
      if (!configurationsEqual(before, after)) {
        configs.push(after);
      } else {
        this.logger.debug(LogCategory.EVENTS, 'Configuration unchanged, primary push skipped', {
          username: event.username,
          property,
        });
      }
      if (rule.impactful) {
        for (const report of await tx.users.findDirectReports(event.username)) {
          configs.push(await this.rules.calculate(report.username, tx));
        }
      }
      return { action: 'updated', configs };
    });
  }

  private async createUser(username: string): Promise<PendingPushes> {
    if (await this.store.users.findByUsername(username)) {
      this.logger.info(LogCategory.EVENTS, 'NewUser for a known user, nothing to do', { username });
      return { action: 'ignored', configs: [] };
    }

    const profile = await this.directory.fetchUserByUsername(username);
    if (!profile) {
      this.logger.warn(LogCategory.EVENTS, 'NewUser not found in directory', { username });
      return { action: 'ignored', configs: [] };
    }

    return this.transaction(async (tx) => {
      if (await tx.users.findByUsername(username)) {
        return { action: 'ignored', configs: [] };
      }
      const managerUsername = profile.managerUsername
        ? await this.resolveManager(tx, username, profile.managerUsername)
        : null;
      await tx.users.save({ ...profile, managerUsername });

      const configs = [await this.rules.calculate(username, tx)];
      if (managerUsername) {
        configs.push(await this.rules.calculate(managerUsername, tx));
      }
      return { action: 'created', configs };
    });
  }

  /** A manager reference that does not resolve to another stored user is dropped. */
  private async resolveManager(tx: StateRepositories, username: string, managerUsername: string): Promise<string | null> {
    if (managerUsername !== username && (await tx.users.findByUsername(managerUsername))) {
      return managerUsername;
    }
    this.warnIntegrity(new DataIntegrityWarning('Manager reference does not resolve, cleared', { username, managerUsername }));
    return null;
  }

  // ─── Team events ──────────────────────────────────────────────────

  async processTeamEvent(event: TeamChangeEvent): Promise<ProcessingResult> {
    const pending = await this.transaction((tx) =>
      event.members.length === 0 ? this.applyTeamWithoutMembers(tx, event) : this.applyMemberDeltas(tx, event),
    );
    return this.finish(pending, { teamId: event.teamId, teamType: event.teamType });
  }

  private async applyTeamWithoutMembers(tx: StateRepositories, event: TeamChangeEvent): Promise<PendingPushes> {
    const team = await tx.teams.findById(event.teamId);

    if (event.effectiveEndDate === null) {
      if (!team && event.teamName) {
        await tx.teams.save({ teamId: event.teamId, name: event.teamName, teamType: event.teamType, active: true });
        this.logger.info(LogCategory.EVENTS, 'Team registered', { teamId: event.teamId, name: event.teamName });
      }
      return { action: 'ignored', configs: [] };
    }

    if (!team) {
      this.logger.warn(LogCategory.EVENTS, 'Deactivation for unknown team ignored', { teamId: event.teamId });
      return { action: 'ignored', configs: [] };
    }

    await tx.teams.setActive(event.teamId, false);
    const removed = await tx.memberships.deleteByTeam(event.teamId);
    this.logger.info(LogCategory.EVENTS, 'Team deactivated', { teamId: event.teamId, formerMembers: removed.length });

    return { action: 'team-deactivated', configs: await this.calculateMany(tx, removed.map((m) => m.username)) };
  }

  private async applyMemberDeltas(tx: StateRepositories, event: TeamChangeEvent): Promise<PendingPushes> {
    let team = await tx.teams.findById(event.teamId);
    if (!team) {
      if (!event.teamName) {
        this.logger.warn(LogCategory.EVENTS, 'Member change for unknown team without a name ignored', {
          teamId: event.teamId,
        });
        return { action: 'ignored', configs: [] };
      }
      team = await tx.teams.save({ teamId: event.teamId, name: event.teamName, teamType: event.teamType, active: true });
      this.logger.info(LogCategory.EVENTS, 'Team registered', { teamId: team.teamId, name: team.name });
    }

    const today = isoDate(this.clock.now());
    const blastRadius = new Set<string>();
    for (const delta of event.members) {
      const affected = await this.applyMemberDelta(tx, team.teamId, delta, today);
      affected.forEach((username) => blastRadius.add(username));
    }

    return { action: 'members-changed', configs: await this.calculateMany(tx, [...blastRadius]) };
  }

  /** Returns the usernames whose configuration the delta may change. */
  private async applyMemberDelta(
    tx: StateRepositories,
    teamId: number,
    delta: TeamMemberDelta,
    today: string,
  ): Promise<string[]> {
    const user = await tx.users.findByEmployeeId(delta.employeeId);
    if (!user) {
      this.warnIntegrity(
        new DataIntegrityWarning('Team member does not resolve to a user, skipped', { teamId, employeeId: delta.employeeId }),
      );
      return [];
    }

    const leaving = !delta.active || (delta.effectiveEndDate !== null && delta.effectiveEndDate < today);
    if (leaving) {
      await tx.memberships.delete(user.username, teamId);
      const remaining = await tx.memberships.findByTeam(teamId);
      return [user.username, ...remaining.map((m) => m.username)];
    }

    await tx.memberships.upsert({
      username: user.username,
      teamId,
      role: delta.role,
      effectiveStartDate: delta.effectiveStartDate,
      effectiveEndDate: delta.effectiveEndDate,
    });
    const affected = (await tx.memberships.findByTeam(teamId)).map((m) => m.username);
    if (delta.role !== null && this.managementRoles.has(delta.role)) {
      const reports = await tx.users.findDirectReports(user.username);
      affected.push(...reports.map((r) => r.username));
    }
    return affected;
  }

  // ─── Shared ───────────────────────────────────────────────────────

  private async calculateMany(tx: StateRepositories, usernames: string[]): Promise<DesiredConfiguration[]> {
    const configs: DesiredConfiguration[] = [];
    for (const username of new Set(usernames)) {
      try {
        configs.push(await this.rules.calculate(username, tx));
      } catch (error: unknown) {
        if (!(error instanceof NotFoundError)) throw error;
        this.logger.warn(LogCategory.EVENTS, 'Blast-radius user vanished, skipped', { username });
      }
    }
    return configs;
  }

  private async transaction(work: (tx: StateRepositories) => Promise<PendingPushes>): Promise<PendingPushes> {
    try {
      return await this.store.transaction(work);
    } catch (error: unknown) {
      if (!(error instanceof PoisonMessageError)) {
        this.metrics.increment('storeFailures');
        this.logger.error(LogCategory.STORE, 'Event transaction rolled back', error);
      }
      throw error;
    }
  }

  private async finish(pending: PendingPushes, details: Record<string, unknown>): Promise<ProcessingResult> {
    const pushed = pending.configs.length > 0 ? await this.vendorSync.pushAll(pending.configs) : NOTHING_PUSHED;
    this.metrics.increment('eventsProcessed');
    this.logger.info(LogCategory.EVENTS, 'Event applied', { ...details, action: pending.action, ...pushed });
    return { action: pending.action, pushed: { ...pushed } };
  }

  private ignoreUnknownUser(username: string): PendingPushes {
    this.logger.warn(LogCategory.EVENTS, 'Event for unknown user ignored', { username });
    return { action: 'ignored', configs: [] };
  }

  private warnIntegrity(warning: DataIntegrityWarning): void {
    this.logger.warn(LogCategory.EVENTS, warning.message, warning.details);
  }
}
