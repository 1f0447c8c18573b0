import { LogCategory } from '../logging/log-levels';
import { SyncLogger } from '../logging/sync-logger.service';
import { ResilienceMetricsService } from './resilience-metrics.service';

describe('ResilienceMetricsService', () => {
  let logger: SyncLogger;
  let metrics: ResilienceMetricsService;

  beforeEach(() => {
    logger = new SyncLogger();
    metrics = new ResilienceMetricsService(logger);
  });

  it('should count increments per counter', () => {
    metrics.increment('poisonMessages');
    metrics.increment('pushesSent', 3);

    expect(metrics.getStats().counters).toEqual({
      poisonMessages: 1,
      vendorFailures: 0,
      pushesSent: 3,
      pushesFailed: 0,
      retriesScheduled: 0,
      eventsProcessed: 0,
      storeFailures: 0,
    });
  });

  it('should read gauges at the time stats are taken', () => {
    let pending = 2;
    metrics.registerGauge('pendingRetries', () => pending);
    metrics.registerGauge('breakerState', () => 'CLOSED');

    pending = 7;

    expect(metrics.getStats().gauges).toEqual({ pendingRetries: 7, breakerState: 'CLOSED' });
  });

  describe('emitSummary', () => {
    let info: jest.SpyInstance;
    let warn: jest.SpyInstance;

    beforeEach(() => {
      info = jest.spyOn(logger, 'info').mockImplementation(() => undefined);
      warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    });

    it('should log one statistics line when everything is quiet', () => {
      metrics.increment('eventsProcessed', 5);
      metrics.registerGauge('pendingRetries', () => 0);

      metrics.emitSummary();

      expect(info).toHaveBeenCalledWith(
        LogCategory.RESILIENCE,
        'Resilience statistics',
        expect.objectContaining({ eventsProcessed: 5, pendingRetries: 0 }),
      );
      expect(warn).not.toHaveBeenCalled();
    });

    it('should warn when the retry queue and failures pass their thresholds', () => {
      metrics.registerGauge('pendingRetries', () => 101);
      metrics.increment('pushesFailed', 51);

      metrics.emitSummary();

      expect(warn).toHaveBeenCalledWith(LogCategory.RESILIENCE, 'Vendor retry queue is growing', { pendingRetries: 101 });
      expect(warn).toHaveBeenCalledWith(LogCategory.RESILIENCE, 'Vendor push failures above threshold', {
        pushesFailed: 51,
      });
    });
  });
});
