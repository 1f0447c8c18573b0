import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import pLimit from 'p-limit';

import { BacklogFullError, PoisonMessageError } from '../../domain/errors';
import { SYNC_CONFIG, type SyncConfig } from '../config/sync-config';
import { SyncLogger } from '../logging/sync-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ResilienceMetricsService } from '../metrics/resilience-metrics.service';
import { CircuitState } from '../vendor/resilience/circuit-breaker';
import { ResilientVendorClient } from '../vendor/resilient-vendor.client';
import { ChangeEventProcessor } from './change-event.processor';
import { parseDirectoryEvent, parseTeamEvent, type DirectoryChangeEvent, type TeamChangeEvent } from './event-schemas';

export type EventKind = 'directory' | 'team';

export type ChangeEvent =
  | { kind: 'directory'; event: DirectoryChangeEvent }
  | { kind: 'team'; event: TeamChangeEvent };

export interface IntakeReceipt {
  accepted: number;
  poison: Array<{ index: number; issues: string[] }>;
}

export function eventKey(change: ChangeEvent): string {
  return change.kind === 'directory' ? `user:${change.event.username}` : `team:${change.event.teamId}`;
}

/**
 * ChangeEventDispatcher: keyed, bounded event execution.
 *
 * Events sharing a key (username or team id) run one after another in
 * arrival order; different keys run concurrently up to
 * EVENT_WORKER_CONCURRENCY. While the vendor circuit is open, queued events
 * wait and new ones pile up until EVENT_BACKLOG_LIMIT, after which intake
 * is refused.
 */
@Injectable()
export class ChangeEventDispatcher implements OnModuleInit, OnModuleDestroy {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly backlogLimit: number;
  private readonly chains = new Map<string, Promise<void>>();
  private pending = 0;
  private resumed: Promise<void> | null = null;
  private release: (() => void) | null = null;
  private unsubscribe?: () => void;

  constructor(
    private readonly processor: ChangeEventProcessor,
    private readonly vendor: ResilientVendorClient,
    @Inject(SYNC_CONFIG) config: Pick<SyncConfig, 'events'>,
    private readonly logger: SyncLogger,
    private readonly metrics: ResilienceMetricsService,
  ) {
    this.limit = pLimit(config.events.workerConcurrency);
    this.backlogLimit = config.events.backlogLimit;
    metrics.registerGauge('backlogSize', () => this.pending);
  }

  onModuleInit(): void {
    this.unsubscribe = this.vendor.onBreakerStateChange((_from, to) => {
      if (to === CircuitState.OPEN) this.pause();
      else this.resume();
    });
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
    this.resume();
  }

  get isPaused(): boolean {
    return this.resumed !== null;
  }

  /** Accepted events not yet finished. */
  get backlogSize(): number {
    return this.pending;
  }

  /**
   * Validate and enqueue raw payloads. Malformed payloads are counted and
   * discarded; the rest are accepted as a whole or not at all.
   * @throws BacklogFullError
   */
  submit(kind: EventKind, payloads: unknown[]): IntakeReceipt {
    const events: ChangeEvent[] = [];
    const poison: IntakeReceipt['poison'] = [];

    payloads.forEach((raw, index) => {
      try {
        events.push(kind === 'directory' ? { kind, event: parseDirectoryEvent(raw) } : { kind, event: parseTeamEvent(raw) });
      } catch (error: unknown) {
        if (!(error instanceof PoisonMessageError)) throw error;
        this.recordPoison(kind, error);
        poison.push({ index, issues: error.issues });
      }
    });

    if (this.pending + events.length > this.backlogLimit) {
      this.logger.warn(LogCategory.EVENTS, 'Event intake refused, backlog full', {
        pending: this.pending,
        limit: this.backlogLimit,
        offered: events.length,
      });
      throw new BacklogFullError(this.backlogLimit);
    }

    events.forEach((change) => this.enqueue(change));
    return { accepted: events.length, poison };
  }

  pause(): void {
    if (this.resumed) return;
    this.resumed = new Promise<void>((resolve) => {
      this.release = resolve;
    });
    this.logger.warn(LogCategory.EVENTS, 'Event processing paused', { pending: this.pending });
  }

  resume(): void {
    if (!this.release) return;
    const release = this.release;
    this.release = null;
    this.resumed = null;
    release();
    this.logger.info(LogCategory.EVENTS, 'Event processing resumed', { pending: this.pending });
  }

  /** Resolves once every accepted event has finished. */
  async drain(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }

  private enqueue(change: ChangeEvent): void {
    const key = eventKey(change);
    this.pending++;

    const previous = this.chains.get(key) ?? Promise.resolve();
    const next = previous
      .then(() => this.waitWhilePaused())
      .then(() => this.limit(() => this.run(key, change)))
      .finally(() => {
        this.pending--;
        if (this.chains.get(key) === next) this.chains.delete(key);
      });
    this.chains.set(key, next);
  }

  private async waitWhilePaused(): Promise<void> {
    while (this.resumed) {
      await this.resumed;
    }
  }

  /** Never rejects; a failed event must not stall its key. */
  private run(key: string, change: ChangeEvent): Promise<void> {
    const context = { correlationId: randomUUID(), eventKey: key, source: `${change.kind}-event`, startTime: Date.now() };
    return this.logger.runWithContext(context, async () => {
      try {
        if (change.kind === 'directory') {
          await this.processor.processDirectoryEvent(change.event);
        } else {
          await this.processor.processTeamEvent(change.event);
        }
      } catch (error: unknown) {
        if (error instanceof PoisonMessageError) {
          this.recordPoison(change.kind, error);
        } else {
          this.logger.error(LogCategory.EVENTS, 'Event processing failed', error, { key });
        }
      }
    });
  }

  private recordPoison(kind: EventKind, error: PoisonMessageError): void {
    this.metrics.increment('poisonMessages');
    this.logger.warn(LogCategory.EVENTS, 'Poison message discarded', { kind, reason: error.message, issues: error.issues });
  }
}
