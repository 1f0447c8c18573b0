import { createSyncStack, type SyncStack } from '../../../test/helpers/sync-stack';
import { BacklogFullError, PoisonMessageError } from '../../domain/errors';
import { CircuitState } from '../vendor/resilience/circuit-breaker';
import { ChangeEventDispatcher, eventKey } from './change-event.dispatcher';
import { ChangeEventProcessor, type ProcessingResult } from './change-event.processor';
import type { DirectoryChangeEvent } from './event-schemas';

const DONE: ProcessingResult = { action: 'updated', pushed: { sent: 0, retryScheduled: 0, failed: 0 } };

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const change = (username: string, newValue: string) => ({
  username,
  changeType: 'DataChange',
  property: 'title',
  newValue,
});

describe('ChangeEventDispatcher', () => {
  let stack: SyncStack;
  let processor: ChangeEventProcessor;
  let dispatcher: ChangeEventDispatcher;
  let started: string[];
  let processDirectoryEvent: jest.SpyInstance<Promise<ProcessingResult>, [DirectoryChangeEvent]>;

  const setUp = (env: Record<string, string> = {}) => {
    stack = createSyncStack(env);
    processor = new ChangeEventProcessor(
      stack.store,
      stack.rules,
      stack.vendorSync,
      { fetchAllUsers: async () => [], fetchUserByUsername: async () => null },
      stack.config,
      stack.clock,
      stack.logger,
      stack.metrics,
    );
    started = [];
    processDirectoryEvent = jest.spyOn(processor, 'processDirectoryEvent').mockImplementation(async (event) => {
      started.push(`${event.username}:${event.newValue ?? ''}`);
      return DONE;
    });
    dispatcher = new ChangeEventDispatcher(processor, stack.client, stack.config, stack.logger, stack.metrics);
    dispatcher.onModuleInit();
  };

  afterEach(() => {
    dispatcher.onModuleDestroy();
    stack.dispose();
  });

  describe('with default settings', () => {
    beforeEach(() => setUp());

    it('should key directory events by username and team events by team id', () => {
      expect(
        eventKey({
          kind: 'directory',
          event: { username: 'p1', changeType: 'NewUser', property: null, oldValue: null, newValue: null },
        }),
      ).toBe('user:p1');
      expect(
        eventKey({
          kind: 'team',
          event: { teamId: 7, teamType: 'VTM', teamName: null, effectiveBeginDate: null, effectiveEndDate: null, members: [] },
        }),
      ).toBe('team:7');
    });

    it('should accept valid events and report malformed ones by index', async () => {
      const receipt = dispatcher.submit('directory', [change('p1', 'a'), { username: 'p2' }, change('p3', 'c')]);

      expect(receipt).toEqual({
        accepted: 2,
        poison: [{ index: 1, issues: ['changeType: Required'] }],
      });
      expect(stack.metrics.getStats().counters.poisonMessages).toBe(1);

      await dispatcher.drain();
      expect(started).toEqual(['p1:a', 'p3:c']);
    });

    it('should run events for one key in arrival order while other keys proceed', async () => {
      let release: () => void = () => undefined;
      processDirectoryEvent.mockImplementationOnce(async (event) => {
        started.push(`${event.username}:${event.newValue ?? ''}`);
        await new Promise<void>((resolve) => {
          release = resolve;
        });
        return DONE;
      });

      dispatcher.submit('directory', [change('p1', 'a'), change('p1', 'b'), change('p2', 'x')]);
      await flush();

      expect(started).toEqual(['p1:a', 'p2:x']);
      expect(dispatcher.backlogSize).toBe(2);

      release();
      await dispatcher.drain();

      expect(started).toEqual(['p1:a', 'p2:x', 'p1:b']);
      expect(dispatcher.backlogSize).toBe(0);
    });

    it('should hold events while paused and run them on resume', async () => {
      dispatcher.pause();
      dispatcher.submit('directory', [change('p1', 'a')]);
      await flush();

      expect(dispatcher.isPaused).toBe(true);
      expect(started).toEqual([]);

      dispatcher.resume();
      await dispatcher.drain();

      expect(started).toEqual(['p1:a']);
    });

    it('should keep a key moving after an event fails', async () => {
      processDirectoryEvent.mockRejectedValueOnce(new Error('store locked'));

      dispatcher.submit('directory', [change('p1', 'a'), change('p1', 'b')]);
      await dispatcher.drain();

      expect(started).toEqual(['p1:b']);
    });

    it('should count poison raised while processing', async () => {
      processDirectoryEvent.mockRejectedValueOnce(new PoisonMessageError('Unknown directory property "mail"'));

      dispatcher.submit('directory', [change('p1', 'a')]);
      await dispatcher.drain();

      expect(stack.metrics.getStats().counters.poisonMessages).toBe(1);
    });

    it('should dispatch team events to the team handler', async () => {
      const processTeamEvent = jest.spyOn(processor, 'processTeamEvent').mockResolvedValue(DONE);

      dispatcher.submit('team', [{ teamId: '21', teamType: 'vtm' }]);
      await dispatcher.drain();

      expect(processTeamEvent).toHaveBeenCalledWith({
        teamId: 21,
        teamType: 'VTM',
        teamName: null,
        effectiveBeginDate: null,
        effectiveEndDate: null,
        members: [],
      });
    });
  });

  it('should refuse a batch that would overflow the backlog', async () => {
    setUp({ EVENT_BACKLOG_LIMIT: '2' });
    dispatcher.pause();
    dispatcher.submit('directory', [change('p1', 'a'), change('p2', 'b')]);

    expect(() => dispatcher.submit('directory', [change('p3', 'c')])).toThrow(BacklogFullError);
    expect(dispatcher.backlogSize).toBe(2);
    expect(stack.metrics.getStats().gauges.backlogSize).toBe(2);

    dispatcher.resume();
    await dispatcher.drain();
    expect(started).toEqual(['p1:a', 'p2:b']);
  });

  it('should pause while the vendor circuit is open and resume when it half-opens', async () => {
    setUp({ VENDOR_CB_OPEN_DURATION_MS: '5' });
    jest.spyOn(stack.transport, 'listUsers').mockRejectedValue(new Error('ECONNREFUSED'));
    for (let i = 0; i < 3; i++) {
      await expect(stack.client.getAllUsers()).rejects.toThrow('ECONNREFUSED');
    }

    expect(dispatcher.isPaused).toBe(true);

    await new Promise<void>((resolve) => setTimeout(resolve, 20));

    expect(stack.client.breakerState).toBe(CircuitState.HALF_OPEN);
    expect(dispatcher.isPaused).toBe(false);
  });
});
