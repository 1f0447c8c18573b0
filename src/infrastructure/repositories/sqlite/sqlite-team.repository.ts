import type BetterSqlite3 from 'better-sqlite3';
import type { ITeamRepository } from '../../../domain/repositories/team.repository.interface';
import type { TeamRecord } from '../../../domain/models/team.model';
import { NotFoundError } from '../../../domain/errors';
import type { WriteGuard } from '../write-gate';
import type { TeamRow } from './sqlite-schema';

const toRecord = (row: TeamRow): TeamRecord => ({
  teamId: row.team_id,
  name: row.name,
  teamType: row.team_type,
  active: row.active === 1,
});

export class SqliteTeamRepository implements ITeamRepository {
  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly guard: WriteGuard,
  ) {}

  async save(team: TeamRecord): Promise<TeamRecord> {
    return this.guard(async () => {
      this.db
        .prepare<TeamRow>(
          `INSERT INTO teams (team_id, name, team_type, active) VALUES (@team_id, @name, @team_type, @active)
           ON CONFLICT(team_id) DO UPDATE SET name = excluded.name, team_type = excluded.team_type, active = excluded.active`,
        )
        .run({ team_id: team.teamId, name: team.name, team_type: team.teamType, active: team.active ? 1 : 0 });
      return { ...team };
    });
  }

  async findById(teamId: number): Promise<TeamRecord | null> {
    const row = this.db.prepare<[number], TeamRow>('SELECT * FROM teams WHERE team_id = ?').get(teamId);
    return row ? toRecord(row) : null;
  }

  async findAll(): Promise<TeamRecord[]> {
    return this.db.prepare<[], TeamRow>('SELECT * FROM teams ORDER BY team_id').all().map(toRecord);
  }

  async setActive(teamId: number, active: boolean): Promise<TeamRecord> {
    return this.guard(async () => {
      const result = this.db
        .prepare<[number, number]>('UPDATE teams SET active = ? WHERE team_id = ?')
        .run(active ? 1 : 0, teamId);
      if (result.changes === 0) {
        throw new NotFoundError('team', teamId);
      }
      const row = this.db.prepare<[number], TeamRow>('SELECT * FROM teams WHERE team_id = ?').get(teamId);
      if (!row) {
        throw new NotFoundError('team', teamId);
      }
      return toRecord(row);
    });
  }

  async deleteAll(): Promise<void> {
    await this.guard(async () => {
      this.db.prepare('DELETE FROM teams').run();
    });
  }
}
