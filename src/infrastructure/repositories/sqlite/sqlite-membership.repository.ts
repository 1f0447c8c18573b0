import type BetterSqlite3 from 'better-sqlite3';
import type { IMembershipRepository } from '../../../domain/repositories/membership.repository.interface';
import type { MembershipRecord, MembershipWithTeam } from '../../../domain/models/team.model';
import { NotFoundError } from '../../../domain/errors';
import type { WriteGuard } from '../write-gate';
import type { MembershipRow, MembershipTeamRow } from './sqlite-schema';

const toRecord = (row: MembershipRow): MembershipRecord => ({
  username: row.username,
  teamId: row.team_id,
  role: row.role,
  effectiveStartDate: row.effective_start_date,
  effectiveEndDate: row.effective_end_date,
});

const toRecordWithTeam = (row: MembershipTeamRow): MembershipWithTeam => ({
  ...toRecord(row),
  team: {
    teamId: row.team_id,
    name: row.team_name,
    teamType: row.team_type,
    active: row.team_active === 1,
  },
});

export class SqliteMembershipRepository implements IMembershipRepository {
  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly guard: WriteGuard,
  ) {}

  async upsert(membership: MembershipRecord): Promise<MembershipRecord> {
    return this.guard(async () => {
      if (!this.db.prepare<[string]>('SELECT 1 FROM users WHERE username = ?').get(membership.username)) {
        throw new NotFoundError('user', membership.username);
      }
      if (!this.db.prepare<[number]>('SELECT 1 FROM teams WHERE team_id = ?').get(membership.teamId)) {
        throw new NotFoundError('team', membership.teamId);
      }
      this.db
        .prepare<MembershipRow>(
          `INSERT INTO memberships (username, team_id, role, effective_start_date, effective_end_date)
           VALUES (@username, @team_id, @role, @effective_start_date, @effective_end_date)
           ON CONFLICT(username, team_id) DO UPDATE SET
             role = excluded.role,
             effective_start_date = excluded.effective_start_date,
             effective_end_date = excluded.effective_end_date`,
        )
        .run({
          username: membership.username,
          team_id: membership.teamId,
          role: membership.role,
          effective_start_date: membership.effectiveStartDate,
          effective_end_date: membership.effectiveEndDate,
        });
      return { ...membership };
    });
  }

  async find(username: string, teamId: number): Promise<MembershipRecord | null> {
    const row = this.db
      .prepare<[string, number], MembershipRow>('SELECT * FROM memberships WHERE username = ? AND team_id = ?')
      .get(username, teamId);
    return row ? toRecord(row) : null;
  }

  async findByUsername(username: string): Promise<MembershipWithTeam[]> {
    return this.db
      .prepare<[string], MembershipTeamRow>(
        `SELECT m.*, t.name AS team_name, t.team_type AS team_type, t.active AS team_active
         FROM memberships m JOIN teams t ON t.team_id = m.team_id
         WHERE m.username = ? ORDER BY m.team_id`,
      )
      .all(username)
      .map(toRecordWithTeam);
  }

  async findByTeam(teamId: number): Promise<MembershipRecord[]> {
    return this.db
      .prepare<[number], MembershipRow>('SELECT * FROM memberships WHERE team_id = ? ORDER BY username')
      .all(teamId)
      .map(toRecord);
  }

  async findAll(): Promise<MembershipRecord[]> {
    return this.db
      .prepare<[], MembershipRow>('SELECT * FROM memberships ORDER BY team_id, username')
      .all()
      .map(toRecord);
  }

  async delete(username: string, teamId: number): Promise<boolean> {
    return this.guard(async () => {
      const result = this.db
        .prepare<[string, number]>('DELETE FROM memberships WHERE username = ? AND team_id = ?')
        .run(username, teamId);
      return result.changes > 0;
    });
  }

  async deleteByTeam(teamId: number): Promise<MembershipRecord[]> {
    return this.guard(async () => {
      const removed = await this.findByTeam(teamId);
      this.db.prepare<[number]>('DELETE FROM memberships WHERE team_id = ?').run(teamId);
      return removed;
    });
  }

  async deleteAll(): Promise<void> {
    await this.guard(async () => {
      this.db.prepare('DELETE FROM memberships').run();
    });
  }
}
