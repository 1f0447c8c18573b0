/**
 * FixtureTeamRegistryClient: serves teams from `<FIXTURE_PATH>/team-registry.json`:
 *   { "leaders": { "<username>": [teamId, ...] }, "teams": [TeamWithMembers, ...] }
 */
import { Inject, Injectable } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { SYNC_CONFIG, type SyncConfig } from '../../config/sync-config';
import type { ITeamRegistryClient, TeamSummary, TeamWithMembers } from './team-registry-client.interface';
import { teamWithMembersSchema } from './team-registry.schemas';

export const TEAM_REGISTRY_FIXTURE_FILE = 'team-registry.json';

const fixtureSchema = z.object({
  leaders: z.record(z.array(z.number().int())),
  teams: z.array(teamWithMembersSchema),
});

type RegistryFixture = z.infer<typeof fixtureSchema>;

@Injectable()
export class FixtureTeamRegistryClient implements ITeamRegistryClient {
  private fixture?: Promise<RegistryFixture>;

  constructor(@Inject(SYNC_CONFIG) private readonly config: Pick<SyncConfig, 'fixturePath'>) {}

  async fetchTeamsForLeader(username: string): Promise<TeamSummary[]> {
    const { leaders, teams } = await this.load();
    const ids = new Set(leaders[username] ?? []);
    return teams
      .filter((t) => ids.has(t.teamId))
      .map(({ teamId, name, teamType }) => ({ teamId, name, teamType }));
  }

  async fetchTeamDetails(teamId: number): Promise<TeamWithMembers | null> {
    const { teams } = await this.load();
    const team = teams.find((t) => t.teamId === teamId);
    return team ? { ...team, members: team.members.map((m) => ({ ...m })) } : null;
  }

  private load(): Promise<RegistryFixture> {
    this.fixture ??= readFile(join(this.config.fixturePath, TEAM_REGISTRY_FIXTURE_FILE), 'utf-8')
      .then((raw) => fixtureSchema.parse(JSON.parse(raw)))
      .catch((err: unknown) => {
        this.fixture = undefined;
        throw err;
      });
    return this.fixture;
  }
}
