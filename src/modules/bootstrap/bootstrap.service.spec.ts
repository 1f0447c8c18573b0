import { join } from 'node:path';

import { createSyncStack, type SyncStack } from '../../../test/helpers/sync-stack';
import { toConfigurationView } from '../../domain/models/desired-configuration.model';
import { FixtureDirectoryClient } from '../integrations/directory/fixture-directory.client';
import type { IDirectoryClient } from '../integrations/directory/directory-client.interface';
import { FixtureTeamRegistryClient } from '../integrations/team-registry/fixture-team-registry.client';
import type { ITeamRegistryClient } from '../integrations/team-registry/team-registry-client.interface';
import { ReconciliationService } from '../reconciliation/reconciliation.service';
import { BootstrapService } from './bootstrap.service';

const FIXTURE_PATH = join(__dirname, '..', '..', '..', 'fixtures');

describe('BootstrapService', () => {
  let stack: SyncStack;
  let directory: IDirectoryClient;
  let registry: ITeamRegistryClient;

  const createService = (env: Record<string, string> = {}) => {
    stack = createSyncStack({ FIXTURE_PATH, ...env });
    directory = new FixtureDirectoryClient(stack.config);
    registry = new FixtureTeamRegistryClient(stack.config);
    return build();
  };

  const build = () =>
    new BootstrapService(
      stack.store,
      directory,
      registry,
      new ReconciliationService(stack.rules, stack.client, stack.logger, stack.metrics),
      stack.config,
      stack.clock,
      stack.logger,
    );

  afterEach(() => stack.dispose());

  describe('run', () => {
    it('should seed users, teams and resolvable memberships from the fixtures', async () => {
      const service = createService();

      const summary = await service.run('admin');

      expect(summary).toEqual({
        trigger: 'admin',
        users: 8,
        teams: 2,
        memberships: 5,
        droppedManagerRefs: 1,
        skippedMemberships: 1,
        durationMs: expect.any(Number),
      });
      expect(await stack.store.teams.findAll()).toEqual([
        { teamId: 501, name: 'North Ridge', teamType: 'VTM', active: true },
        { teamId: 502, name: 'Lakeside Support', teamType: 'HTM', active: true },
      ]);
      expect((await stack.store.memberships.findByTeam(502)).map((m) => m.username)).toEqual(['p100004', 'p100007']);
    });

    it('should only keep manager references that resolve to stored users', async () => {
      const service = createService();

      await service.run('admin');

      const managers = (await stack.store.users.findAll()).map((u) => [u.username, u.managerUsername]);
      expect(managers).toEqual([
        ['p100001', null],
        ['p100002', 'p100001'],
        ['p100003', 'p100001'],
        ['p100004', 'p100003'],
        ['p100005', null],
        ['p100006', 'p100003'],
        ['p100007', null],
        ['p100008', null],
      ]);
    });

    it('should leave the store ready for the compliance rules', async () => {
      const service = createService();
      await service.run('admin');

      const views = [...(await stack.rules.calculateAll()).values()].map((c) => [
        c.username,
        toConfigurationView(c).visibilityProfile,
        toConfigurationView(c).groups,
      ]);

      expect(views).toEqual([
        [
          'p100001',
          'Vis_HO_Katherine_Powell_(p100001)',
          ['US Home Office Submitters', 'US_BR_Katherine_Powell_(p100001)', 'US_HO_Katherine_Powell_(p100001)'],
        ],
        ['p100002', 'Vis-US-HO', ['US Home Office Submitters']],
        ['p100003', 'Vis_US-North_Ridge-VTM', ['US Field Submitters', 'US-North_Ridge-VTM']],
        ['p100004', 'Vis_Lakeside_Support_North_Ridge', ['Lakeside_Support_North_Ridge', 'US Field Submitters']],
        ['p100005', 'Vis-CA-HO', ['CAN Home Office Submitters']],
        ['p100006', 'Vis-US-BR', ['US Field Submitters']],
        ['p100007', 'Vis-US-BR', ['US Field Submitters']],
        ['p100008', 'Default-Profile', []],
      ]);
    });

    it('should replace whatever the store held before', async () => {
      const service = createService();
      await stack.store.users.save({
        username: 'p199999',
        employeeId: null,
        firstName: 'Stale',
        lastName: 'Entry',
        title: null,
        distinguishedName: null,
        country: null,
        managerUsername: null,
        active: true,
      });
      await stack.store.teams.save({ teamId: 999, name: 'Old Team', teamType: 'SFA', active: true });

      await service.run('admin');

      expect(await stack.store.users.findByUsername('p199999')).toBeNull();
      expect(await stack.store.teams.findById(999)).toBeNull();
    });

    it('should abort before touching the store when a source fails', async () => {
      createService();
      await stack.store.teams.save({ teamId: 999, name: 'Old Team', teamType: 'SFA', active: true });
      directory = {
        fetchAllUsers: () => Promise.reject(new Error('directory unreachable')),
        fetchUserByUsername: async () => null,
      };
      const service = build();

      await expect(service.run('admin')).rejects.toThrow('directory unreachable');

      expect(await stack.store.teams.findById(999)).not.toBeNull();
      expect(service.isRunning).toBe(false);
    });

    it('should skip a team the registry lists for a leader but cannot describe', async () => {
      createService();
      const fixtureRegistry = registry;
      registry = {
        fetchTeamsForLeader: (username) => fixtureRegistry.fetchTeamsForLeader(username),
        fetchTeamDetails: async (teamId) => (teamId === 502 ? null : fixtureRegistry.fetchTeamDetails(teamId)),
      };

      const summary = await build().run('admin');

      expect(summary).toMatchObject({ teams: 1, memberships: 3, skippedMemberships: 0 });
    });

    it('should refuse to start a second run while one is in progress', async () => {
      const service = createService();

      const first = service.run('admin');

      await expect(service.run('admin')).rejects.toThrow('Bootstrap already running');
      await expect(first).resolves.toMatchObject({ users: 8 });
    });

    it('should reconcile afterwards when configured to', async () => {
      const service = createService({ BOOTSTRAP_RECONCILE: 'true' });

      const summary = await service.run('admin');

      expect(summary.reconciliation).toMatchObject({ status: 'completed', checked: 8, created: 8, failed: 0 });
      expect(stack.transport.get('p100004')?.visibilityProfile).toBe('Vis_Lakeside_Support_North_Ridge');
    });
  });

  describe('onApplicationBootstrap', () => {
    it('should seed an empty store on startup', async () => {
      const service = createService();

      await service.onApplicationBootstrap();

      expect(await stack.store.users.count()).toBe(8);
    });

    it('should leave a seeded store alone', async () => {
      const service = createService();
      await service.run('admin');
      await stack.store.users.update('p100002', { title: 'Changed Locally' });

      await service.onApplicationBootstrap();

      expect((await stack.store.users.findByUsername('p100002'))?.title).toBe('Changed Locally');
    });

    it('should do nothing when startup seeding is disabled', async () => {
      const service = createService({ BOOTSTRAP_ON_STARTUP: 'false' });

      await service.onApplicationBootstrap();

      expect(await stack.store.users.count()).toBe(0);
    });

    it('should rethrow a failed startup seed', async () => {
      createService();
      directory = {
        fetchAllUsers: () => Promise.reject(new Error('directory unreachable')),
        fetchUserByUsername: async () => null,
      };

      await expect(build().onApplicationBootstrap()).rejects.toThrow('directory unreachable');
    });
  });
});
