/**
 * HttpTeamRegistryClient
 *
 * GET {base}/leaders/{username}/teams → TeamSummary[]
 * GET {base}/teams/{teamId}           → TeamWithMembers, or 404
 */
import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';

import { SYNC_CONFIG, type SyncConfig } from '../../config/sync-config';
import { SyncLogger } from '../../logging/sync-logger.service';
import { LogCategory } from '../../logging/log-levels';
import { HttpStatusError, joinUrl, requestJson } from '../http-json';
import type { ITeamRegistryClient, TeamSummary, TeamWithMembers } from './team-registry-client.interface';
import { teamSummarySchema, teamWithMembersSchema } from './team-registry.schemas';

@Injectable()
export class HttpTeamRegistryClient implements ITeamRegistryClient {
  private readonly settings: SyncConfig['teamRegistry'];

  constructor(
    @Inject(SYNC_CONFIG) config: SyncConfig,
    private readonly logger: SyncLogger,
  ) {
    this.settings = config.teamRegistry;
  }

  async fetchTeamsForLeader(username: string): Promise<TeamSummary[]> {
    const url = joinUrl(this.settings.baseUrl, `leaders/${encodeURIComponent(username)}/teams`);
    try {
      const teams = await requestJson(url, z.array(teamSummarySchema), { timeoutMs: this.settings.timeoutMs });
      this.logger.debug(LogCategory.TEAM_REGISTRY, 'Fetched teams for leader', { username, count: teams.length });
      return teams;
    } catch (err) {
      if (err instanceof HttpStatusError && err.status === 404) {
        return [];
      }
      throw err;
    }
  }

  async fetchTeamDetails(teamId: number): Promise<TeamWithMembers | null> {
    const url = joinUrl(this.settings.baseUrl, `teams/${teamId}`);
    try {
      return await requestJson(url, teamWithMembersSchema, { timeoutMs: this.settings.timeoutMs });
    } catch (err) {
      if (err instanceof HttpStatusError && err.status === 404) {
        return null;
      }
      throw err;
    }
  }
}
