import type { ITeamRepository } from '../../../domain/repositories/team.repository.interface';
import type { TeamRecord } from '../../../domain/models/team.model';
import { NotFoundError } from '../../../domain/errors';
import type { WriteGuard } from '../write-gate';
import type { InMemoryTables } from './inmemory-tables';

export class InMemoryTeamRepository implements ITeamRepository {
  constructor(
    private readonly tables: InMemoryTables,
    private readonly guard: WriteGuard,
  ) {}

  async save(team: TeamRecord): Promise<TeamRecord> {
    return this.guard(async () => {
      this.tables.teams.set(team.teamId, { ...team });
      return { ...team };
    });
  }

  async findById(teamId: number): Promise<TeamRecord | null> {
    const team = this.tables.teams.get(teamId);
    return team ? { ...team } : null;
  }

  async findAll(): Promise<TeamRecord[]> {
    return Array.from(this.tables.teams.values())
      .sort((a, b) => a.teamId - b.teamId)
      .map((t) => ({ ...t }));
  }

  async setActive(teamId: number, active: boolean): Promise<TeamRecord> {
    return this.guard(async () => {
      const existing = this.tables.teams.get(teamId);
      if (!existing) {
        throw new NotFoundError('team', teamId);
      }
      const updated = { ...existing, active };
      this.tables.teams.set(teamId, updated);
      return { ...updated };
    });
  }

  async deleteAll(): Promise<void> {
    await this.guard(async () => {
      this.tables.teams.clear();
    });
  }
}
