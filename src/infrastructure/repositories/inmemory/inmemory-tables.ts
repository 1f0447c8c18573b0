import type { UserRecord } from '../../../domain/models/user.model';
import type { MembershipRecord, TeamRecord } from '../../../domain/models/team.model';

/** Backing maps shared by the in-memory repositories of one store. */
export interface InMemoryTables {
  users: Map<string, UserRecord>;
  teams: Map<number, TeamRecord>;
  /** Keyed by membershipKey(username, teamId). */
  memberships: Map<string, MembershipRecord>;
}

export function createTables(): InMemoryTables {
  return { users: new Map(), teams: new Map(), memberships: new Map() };
}

export function membershipKey(username: string, teamId: number): string {
  return `${teamId}:${username}`;
}

export function cloneTables(tables: InMemoryTables): InMemoryTables {
  return {
    users: new Map([...tables.users].map(([k, v]) => [k, { ...v }])),
    teams: new Map([...tables.teams].map(([k, v]) => [k, { ...v }])),
    memberships: new Map([...tables.memberships].map(([k, v]) => [k, { ...v }])),
  };
}

/** Replace the contents of `target` with those of `source`, keeping the Map identities. */
export function restoreTables(target: InMemoryTables, source: InMemoryTables): void {
  target.users.clear();
  source.users.forEach((v, k) => target.users.set(k, v));
  target.teams.clear();
  source.teams.forEach((v, k) => target.teams.set(k, v));
  target.memberships.clear();
  source.memberships.forEach((v, k) => target.memberships.set(k, v));
}
