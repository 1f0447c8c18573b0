import { Injectable } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';

import { SyncLogger } from '../logging/sync-logger.service';
import { LogCategory } from '../logging/log-levels';

export type CounterName =
  | 'poisonMessages'
  | 'vendorFailures'
  | 'pushesSent'
  | 'pushesFailed'
  | 'retriesScheduled'
  | 'eventsProcessed'
  | 'storeFailures';

export type GaugeName = 'pendingRetries' | 'backlogSize' | 'breakerState';

type GaugeReader = () => number | string;

export interface ResilienceStats {
  counters: Record<CounterName, number>;
  gauges: Partial<Record<GaugeName, number | string>>;
  since: string;
}

const EMPTY_COUNTERS: Record<CounterName, number> = {
  poisonMessages: 0,
  vendorFailures: 0,
  pushesSent: 0,
  pushesFailed: 0,
  retriesScheduled: 0,
  eventsProcessed: 0,
  storeFailures: 0,
};

export const PENDING_RETRIES_WARN_THRESHOLD = 100;
export const FAILED_PUSHES_WARN_THRESHOLD = 50;

/**
 * Process-wide resilience counters.
 *
 * Gauges are owned by the services that hold the state (retry queue,
 * dispatcher, vendor client) and registered here as readers.
 */
@Injectable()
export class ResilienceMetricsService {
  private readonly counters: Record<CounterName, number> = { ...EMPTY_COUNTERS };
  private readonly gauges = new Map<GaugeName, GaugeReader>();
  private readonly since = new Date();

  constructor(private readonly logger: SyncLogger) {}

  increment(counter: CounterName, by = 1): void {
    this.counters[counter] += by;
  }

  registerGauge(name: GaugeName, read: GaugeReader): void {
    this.gauges.set(name, read);
  }

  getStats(): ResilienceStats {
    const gauges: Partial<Record<GaugeName, number | string>> = {};
    this.gauges.forEach((read, name) => {
      gauges[name] = read();
    });
    return { counters: { ...this.counters }, gauges, since: this.since.toISOString() };
  }

  /** Periodic statistics line (every 5 minutes). */
  @Interval('resilience-stats', 300_000)
  emitSummary(): void {
    const stats = this.getStats();
    this.logger.info(LogCategory.RESILIENCE, 'Resilience statistics', { ...stats.counters, ...stats.gauges });

    const pending = stats.gauges.pendingRetries;
    if (typeof pending === 'number' && pending > PENDING_RETRIES_WARN_THRESHOLD) {
      this.logger.warn(LogCategory.RESILIENCE, 'Vendor retry queue is growing', { pendingRetries: pending });
    }
    if (stats.counters.pushesFailed > FAILED_PUSHES_WARN_THRESHOLD) {
      this.logger.warn(LogCategory.RESILIENCE, 'Vendor push failures above threshold', {
        pushesFailed: stats.counters.pushesFailed,
      });
    }
  }
}
