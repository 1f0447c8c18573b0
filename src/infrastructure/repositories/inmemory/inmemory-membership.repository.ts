import type { IMembershipRepository } from '../../../domain/repositories/membership.repository.interface';
import type { MembershipRecord, MembershipWithTeam } from '../../../domain/models/team.model';
import { NotFoundError } from '../../../domain/errors';
import type { WriteGuard } from '../write-gate';
import { membershipKey, type InMemoryTables } from './inmemory-tables';

export class InMemoryMembershipRepository implements IMembershipRepository {
  constructor(
    private readonly tables: InMemoryTables,
    private readonly guard: WriteGuard,
  ) {}

  async upsert(membership: MembershipRecord): Promise<MembershipRecord> {
    return this.guard(async () => {
      // Same referential rules as the SQL schema's foreign keys
      if (!this.tables.users.has(membership.username)) {
        throw new NotFoundError('user', membership.username);
      }
      if (!this.tables.teams.has(membership.teamId)) {
        throw new NotFoundError('team', membership.teamId);
      }
      this.tables.memberships.set(membershipKey(membership.username, membership.teamId), { ...membership });
      return { ...membership };
    });
  }

  async find(username: string, teamId: number): Promise<MembershipRecord | null> {
    const membership = this.tables.memberships.get(membershipKey(username, teamId));
    return membership ? { ...membership } : null;
  }

  async findByUsername(username: string): Promise<MembershipWithTeam[]> {
    const result: MembershipWithTeam[] = [];
    for (const membership of this.tables.memberships.values()) {
      if (membership.username !== username) continue;
      const team = this.tables.teams.get(membership.teamId);
      if (team) {
        result.push({ ...membership, team: { ...team } });
      }
    }
    return result.sort((a, b) => a.teamId - b.teamId);
  }

  async findByTeam(teamId: number): Promise<MembershipRecord[]> {
    return Array.from(this.tables.memberships.values())
      .filter((m) => m.teamId === teamId)
      .sort((a, b) => a.username.localeCompare(b.username))
      .map((m) => ({ ...m }));
  }

  async findAll(): Promise<MembershipRecord[]> {
    return Array.from(this.tables.memberships.values()).map((m) => ({ ...m }));
  }

  async delete(username: string, teamId: number): Promise<boolean> {
    return this.guard(async () => this.tables.memberships.delete(membershipKey(username, teamId)));
  }

  async deleteByTeam(teamId: number): Promise<MembershipRecord[]> {
    return this.guard(async () => {
      const removed: MembershipRecord[] = [];
      for (const [key, membership] of this.tables.memberships) {
        if (membership.teamId === teamId) {
          removed.push({ ...membership });
          this.tables.memberships.delete(key);
        }
      }
      return removed.sort((a, b) => a.username.localeCompare(b.username));
    });
  }

  async deleteAll(): Promise<void> {
    await this.guard(async () => {
      this.tables.memberships.clear();
    });
  }
}
