import type { MembershipWithTeam, TeamRecord } from '../../domain/models/team.model';
import type { UserRecord } from '../../domain/models/user.model';
import {
  BRANCH_DEFAULT_PROFILE,
  DEFAULT_PROFILE,
  evaluateRules,
  sanitizeName,
  selectPrecedenceTeams,
  type RuleInputs,
} from './compliance-rules';
import { classifyUser, UserType } from './user-classification';
import { submitterGroup } from './submitter-groups';

const HOME_OFFICE_DN = 'CN=x,OU=Home Office,OU=US,DC=example,DC=test';
const BRANCH_DN = 'CN=x,OU=Branch,OU=US,DC=example,DC=test';

const user = (overrides: Partial<UserRecord> = {}): UserRecord => ({
  username: 'p300001',
  employeeId: '300001',
  firstName: 'Ada',
  lastName: 'Quinn',
  title: null,
  distinguishedName: HOME_OFFICE_DN,
  country: 'US',
  managerUsername: null,
  active: true,
  ...overrides,
});

const team = (teamId: number, name: string, teamType: string): TeamRecord => ({ teamId, name, teamType, active: true });

const membership = (username: string, t: TeamRecord, role: string | null = null): MembershipWithTeam => ({
  username,
  teamId: t.teamId,
  role,
  effectiveStartDate: '2024-01-01',
  effectiveEndDate: null,
  team: t,
});

const inputs = (overrides: Partial<RuleInputs> = {}): RuleInputs => ({
  user: user(),
  directReports: [],
  memberships: [],
  teamMembers: () => new Set(),
  ...overrides,
});

const rosters =
  (members: Record<number, string[]>) =>
  (teamId: number): ReadonlySet<string> =>
    new Set(members[teamId] ?? []);

describe('classifyUser', () => {
  it.each([
    [{ distinguishedName: HOME_OFFICE_DN, title: null }, true, UserType.HO_LEADER],
    [{ distinguishedName: BRANCH_DN, title: null }, true, UserType.BR_TEAM],
    [{ distinguishedName: HOME_OFFICE_DN, title: 'Remote Support Lead' }, false, UserType.HOBR],
    [{ distinguishedName: HOME_OFFICE_DN, title: 'Analyst' }, false, UserType.HO],
    [{ distinguishedName: BRANCH_DN, title: null }, false, UserType.BR],
    [{ distinguishedName: 'CN=x,OU=Contractors', title: 'on-caller' }, false, UserType.BR],
    [{ distinguishedName: null, title: null }, false, UserType.UNSPECIFIED],
  ])('should classify %o (leader: %s) as %s', (located, isLeader, expected) => {
    expect(classifyUser(located, isLeader)).toBe(expected);
  });
});

describe('submitterGroup', () => {
  it('should map known countries case-insensitively', () => {
    expect(submitterGroup('US', 'HO')).toBe('US Home Office Submitters');
    expect(submitterGroup('ca', 'BR')).toBe('CAN Field Submitters');
  });

  it('should return null for unknown or missing countries', () => {
    expect(submitterGroup('MX', 'HO')).toBeNull();
    expect(submitterGroup(null, 'BR')).toBeNull();
  });
});

describe('sanitizeName', () => {
  it('should replace spaces and drop dots', () => {
    expect(sanitizeName('Vis_HO_J. R._Smith_(p1)')).toBe('Vis_HO_J_R_Smith_(p1)');
  });
});

describe('evaluateRules', () => {
  describe('standard path', () => {
    it('should give a home-office user the country profile and submitter group', () => {
      const { userType, configuration } = evaluateRules(inputs());

      expect(userType).toBe(UserType.HO);
      expect(configuration).toEqual({
        username: 'p300001',
        firstName: 'Ada',
        lastName: 'Quinn',
        visibilityProfile: 'Vis-US-HO',
        groups: new Set(['US Home Office Submitters']),
        active: true,
      });
    });

    it('should give a user in both locations both submitter groups', () => {
      const { configuration } = evaluateRules(inputs({ user: user({ title: 'Branch Liaison' }) }));

      expect(configuration.visibilityProfile).toBe('Vis-US-HO-BR');
      expect(configuration.groups).toEqual(new Set(['US Home Office Submitters', 'US Field Submitters']));
    });

    it('should fall back to the default profile without a country', () => {
      const { configuration } = evaluateRules(inputs({ user: user({ country: null }) }));

      expect(configuration.visibilityProfile).toBe(DEFAULT_PROFILE);
      expect(configuration.groups.size).toBe(0);
    });

    it('should give an unplaced user the default profile', () => {
      const { userType, configuration } = evaluateRules(inputs({ user: user({ distinguishedName: 'CN=x,OU=Vendors' }) }));

      expect(userType).toBe(UserType.UNSPECIFIED);
      expect(configuration.visibilityProfile).toBe(DEFAULT_PROFILE);
      expect(configuration.groups.size).toBe(0);
    });

    it('should give a home-office leader a personal profile and one group per report location', () => {
      const leader = user({ firstName: 'Mary Ann', lastName: 'St. John' });
      const reports = [
        user({ username: 'p300002', distinguishedName: HOME_OFFICE_DN, country: 'US' }),
        user({ username: 'p300003', distinguishedName: BRANCH_DN, country: 'CA' }),
        user({ username: 'p300004', distinguishedName: BRANCH_DN, country: 'CA' }),
        user({ username: 'p300005', country: null }),
      ];

      const { userType, configuration } = evaluateRules(inputs({ user: leader, directReports: reports }));

      expect(userType).toBe(UserType.HO_LEADER);
      expect(configuration.visibilityProfile).toBe('Vis_HO_Mary_Ann_St_John_(p300001)');
      expect(configuration.groups).toEqual(
        new Set([
          'US_HO_Mary_Ann_St_John_(p300001)',
          'CA_BR_Mary_Ann_St_John_(p300001)',
          'US Home Office Submitters',
        ]),
      );
    });

    it('should name a branch leader after the lexicographically last team group', () => {
      const north = team(20, 'North Ridge', 'ACM');
      const zeta = team(21, 'Zeta Hub', 'ACM');
      const leader = user({ distinguishedName: BRANCH_DN });

      const { userType, configuration } = evaluateRules(
        inputs({
          user: leader,
          directReports: [user({ username: 'p300009' })],
          memberships: [membership('p300001', north, 'LEAD'), membership('p300001', zeta, 'LEAD')],
        }),
      );

      expect(userType).toBe(UserType.BR_TEAM);
      expect(configuration.visibilityProfile).toBe('Vis_US-Zeta_Hub-ACM');
      expect(configuration.groups).toEqual(new Set(['US-North_Ridge-ACM', 'US-Zeta_Hub-ACM', 'US Field Submitters']));
    });

    it('should give a branch leader without teams the branch default profile', () => {
      const { configuration } = evaluateRules(
        inputs({ user: user({ distinguishedName: BRANCH_DN }), directReports: [user({ username: 'p300009' })] }),
      );

      expect(configuration.visibilityProfile).toBe(BRANCH_DEFAULT_PROFILE);
      expect(configuration.groups).toEqual(new Set(['US Field Submitters']));
    });

    it('should carry the active flag through', () => {
      expect(evaluateRules(inputs({ user: user({ active: false }) })).configuration.active).toBe(false);
    });
  });

  describe('multi-team precedence', () => {
    const vtm = team(1, 'Alpha Crew', 'VTM');
    const htm = team(2, 'Beta Desk', 'HTM');
    const sfa = team(3, 'Gamma Field', 'SFA');
    const branchUser = user({ distinguishedName: BRANCH_DN });

    it('should use only the VTM team when it covers every member of the others', () => {
      const result = evaluateRules(
        inputs({
          user: branchUser,
          memberships: [membership('p300001', vtm), membership('p300001', htm)],
          teamMembers: rosters({ 1: ['p300001', 'p300002', 'p300003'], 2: ['p300001', 'p300002'] }),
        }),
      );

      expect(result.precedenceTeams).toEqual(['Alpha Crew']);
      expect(result.configuration.visibilityProfile).toBe('Vis_Alpha_Crew');
      expect(result.configuration.groups).toEqual(new Set(['Alpha_Crew', 'US Field Submitters']));
    });

    it('should add an HTM team that covers someone the VTM team does not', () => {
      const result = evaluateRules(
        inputs({
          user: branchUser,
          memberships: [membership('p300001', htm), membership('p300001', vtm)],
          teamMembers: rosters({ 1: ['p300001', 'p300002'], 2: ['p300001', 'p300004'] }),
        }),
      );

      expect(result.precedenceTeams).toEqual(['Alpha Crew', 'Beta Desk']);
      expect(result.configuration.visibilityProfile).toBe('Vis_Alpha_Crew_Beta_Desk');
      expect(result.configuration.groups).toEqual(new Set(['Alpha_Crew_Beta_Desk', 'US Field Submitters']));
    });

    it('should keep an SFA team whose members an HTM team also holds', () => {
      const selected = selectPrecedenceTeams(
        [membership('p300001', sfa), membership('p300001', htm)],
        rosters({ 2: ['p300001', 'p300005'], 3: ['p300001', 'p300005'] }),
      );

      expect(selected.map((t) => t.teamId)).toEqual([2, 3]);
    });

    it('should judge every HTM team against VTM coverage only', () => {
      const secondHtm = team(4, 'Gamma Desk', 'HTM');
      const selected = selectPrecedenceTeams(
        [membership('p300001', vtm), membership('p300001', htm), membership('p300001', secondHtm)],
        rosters({ 1: ['p300001', 'p300002'], 2: ['p300001', 'p300003'], 4: ['p300001', 'p300003'] }),
      );

      expect(selected.map((t) => t.teamId)).toEqual([1, 2, 4]);
    });

    it('should fall back to the standard path when no precedence team is selected', () => {
      const other = team(4, 'Delta Ops', 'ACM');
      const result = evaluateRules(
        inputs({
          memberships: [membership('p300001', other), membership('p300001', team(5, 'Echo Ops', 'ACM'))],
        }),
      );

      expect(result.precedenceTeams).toBeUndefined();
      expect(result.configuration.visibilityProfile).toBe('Vis-US-HO');
    });
  });

  it('should not mutate its inputs and return equal results on repeat calls', () => {
    const reports = [user({ username: 'p300002' })];
    const given = inputs({ directReports: reports });
    const snapshot = JSON.stringify(given);

    const first = evaluateRules(given);
    const second = evaluateRules(given);

    expect(second).toEqual(first);
    expect(JSON.stringify(given)).toBe(snapshot);
  });
});
