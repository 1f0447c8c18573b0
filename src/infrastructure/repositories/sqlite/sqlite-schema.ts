/**
 * Schema for the SQLite state store. Applied idempotently on open.
 *
 * manager_username is a self-referencing foreign key, so a user can only be
 * saved once its manager exists; bulk loads insert users first and link
 * managers in a second pass.
 */
export const SQLITE_SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
  username           TEXT PRIMARY KEY,
  employee_id        TEXT,
  first_name         TEXT NOT NULL,
  last_name          TEXT NOT NULL,
  title              TEXT,
  distinguished_name TEXT,
  country            TEXT,
  manager_username   TEXT REFERENCES users(username) ON DELETE SET NULL,
  active             INTEGER NOT NULL DEFAULT 1
);
CREATE INDEX IF NOT EXISTS idx_users_manager ON users(manager_username);
CREATE INDEX IF NOT EXISTS idx_users_employee_id ON users(employee_id);

CREATE TABLE IF NOT EXISTS teams (
  team_id   INTEGER PRIMARY KEY,
  name      TEXT NOT NULL,
  team_type TEXT NOT NULL,
  active    INTEGER NOT NULL DEFAULT 1
);

CREATE TABLE IF NOT EXISTS memberships (
  username             TEXT NOT NULL REFERENCES users(username) ON DELETE CASCADE,
  team_id              INTEGER NOT NULL REFERENCES teams(team_id) ON DELETE CASCADE,
  role                 TEXT,
  effective_start_date TEXT,
  effective_end_date   TEXT,
  PRIMARY KEY (username, team_id)
);
CREATE INDEX IF NOT EXISTS idx_memberships_team ON memberships(team_id);
`;

export interface UserRow {
  username: string;
  employee_id: string | null;
  first_name: string;
  last_name: string;
  title: string | null;
  distinguished_name: string | null;
  country: string | null;
  manager_username: string | null;
  active: number;
}

export interface TeamRow {
  team_id: number;
  name: string;
  team_type: string;
  active: number;
}

export interface MembershipRow {
  username: string;
  team_id: number;
  role: string | null;
  effective_start_date: string | null;
  effective_end_date: string | null;
}

export type MembershipTeamRow = MembershipRow & {
  team_name: string;
  team_type: string;
  team_active: number;
};
