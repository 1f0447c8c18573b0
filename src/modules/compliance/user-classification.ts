import type { UserRecord } from '../../domain/models/user.model';

export const UserType = {
  HO_LEADER: 'HO_LEADER',
  BR_TEAM: 'BR_TEAM',
  HOBR: 'HOBR',
  HO: 'HO',
  BR: 'BR',
  UNSPECIFIED: 'UNSPECIFIED',
} as const;

export type UserType = (typeof UserType)[keyof typeof UserType];

export const HOME_OFFICE_MARKER = 'OU=Home Office';
export const BRANCH_MARKER = 'OU=Branch';

const BRANCH_TITLE_PATTERN = /Branch|Remote Support|On-Caller/i;

type Locatable = Pick<UserRecord, 'distinguishedName' | 'title'>;

export function isHomeOffice(user: Locatable): boolean {
  return user.distinguishedName?.includes(HOME_OFFICE_MARKER) ?? false;
}

export function isBranch(user: Locatable): boolean {
  if (user.distinguishedName?.includes(BRANCH_MARKER)) return true;
  return user.title !== null && BRANCH_TITLE_PATTERN.test(user.title);
}

/** Leaders are split by location only; everyone else by both markers. */
export function classifyUser(user: Locatable, isLeader: boolean): UserType {
  const homeOffice = isHomeOffice(user);
  if (isLeader) {
    return homeOffice ? UserType.HO_LEADER : UserType.BR_TEAM;
  }
  const branch = isBranch(user);
  if (homeOffice && branch) return UserType.HOBR;
  if (homeOffice) return UserType.HO;
  if (branch) return UserType.BR;
  return UserType.UNSPECIFIED;
}
