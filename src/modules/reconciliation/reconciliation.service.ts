import { Injectable } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { randomUUID } from 'node:crypto';

import { sameGroups, type DesiredConfiguration } from '../../domain/models/desired-configuration.model';
import { DEFAULT_RECONCILIATION_CRON } from '../config/sync-config';
import { ComplianceRulesService } from '../compliance/compliance-rules.service';
import type { VendorUser } from '../integrations/vendor/vendor-transport.interface';
import { SyncLogger } from '../logging/sync-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ResilienceMetricsService } from '../metrics/resilience-metrics.service';
import { ResilientVendorClient } from '../vendor/resilient-vendor.client';

export interface ReconciliationSummary {
  status: 'completed' | 'skipped';
  checked: number;
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
  /** Desired group / profile names the vendor catalog does not list. */
  unknownGroups: string[];
  unknownProfiles: string[];
  durationMs: number;
}

type Drift = 'missing' | 'different' | 'none';

export function detectDrift(desired: DesiredConfiguration, actual: VendorUser | undefined): Drift {
  if (!actual) return 'missing';
  if (
    actual.active !== desired.active ||
    actual.visibilityProfile !== desired.visibilityProfile ||
    !sameGroups(actual.groups, desired.groups)
  ) {
    return 'different';
  }
  return 'none';
}

/**
 * Daily true-up: compares every active local user's freshly computed
 * configuration with the vendor snapshot and corrects the drift.
 */
@Injectable()
export class ReconciliationService {
  private running = false;

  constructor(
    private readonly rules: ComplianceRulesService,
    private readonly vendor: ResilientVendorClient,
    private readonly logger: SyncLogger,
    private readonly metrics: ResilienceMetricsService,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  @Cron(process.env.RECONCILIATION_CRON || DEFAULT_RECONCILIATION_CRON, {
    name: 'daily-true-up',
    disabled: process.env.RECONCILIATION_ENABLED === 'false',
  })
  async handleCron(): Promise<void> {
    try {
      await this.runDailyTrueUp();
    } catch (error: unknown) {
      this.logger.error(LogCategory.RECONCILIATION, 'Scheduled reconciliation aborted', error);
    }
  }

  async runDailyTrueUp(): Promise<ReconciliationSummary> {
    const startedAt = Date.now();
    if (this.running) {
      this.logger.warn(LogCategory.RECONCILIATION, 'Reconciliation already running, skipped');
      return { ...emptySummary('skipped'), durationMs: 0 };
    }

    this.running = true;
    try {
      return await this.logger.runWithContext(
        { correlationId: randomUUID(), source: 'reconciliation', startTime: startedAt },
        () => this.reconcile(startedAt),
      );
    } finally {
      this.running = false;
    }
  }

  private async reconcile(startedAt: number): Promise<ReconciliationSummary> {
    this.logger.info(LogCategory.RECONCILIATION, 'Reconciliation started');
    const summary = emptySummary('completed');

    const [vendorUsers, groups, profiles] = await Promise.all([
      this.vendor.getAllUsers(),
      this.vendor.getAllGroups(),
      this.vendor.getAllVisibilityProfiles(),
    ]);
    const actualByUsername = new Map(vendorUsers.map((u) => [u.username, u]));
    const desired = await this.rules.calculateAll({ active: true });

    const knownGroups = new Set(groups);
    const knownProfiles = new Set(profiles);
    const unknownGroups = new Set<string>();
    const unknownProfiles = new Set<string>();

    for (const config of desired.values()) {
      summary.checked++;
      config.groups.forEach((g) => {
        if (!knownGroups.has(g)) unknownGroups.add(g);
      });
      if (!knownProfiles.has(config.visibilityProfile)) unknownProfiles.add(config.visibilityProfile);

      const drift = detectDrift(config, actualByUsername.get(config.username));
      if (drift === 'none') {
        summary.unchanged++;
        continue;
      }
      try {
        if (drift === 'missing') {
          await this.vendor.createUser(config);
          summary.created++;
        } else {
          await this.vendor.updateUser(config);
          summary.updated++;
        }
        this.metrics.increment('pushesSent');
      } catch (error: unknown) {
        summary.failed++;
        this.metrics.increment('pushesFailed');
        this.logger.error(LogCategory.RECONCILIATION, 'Drift correction failed', error, {
          username: config.username,
          drift,
        });
      }
    }

    summary.unknownGroups = [...unknownGroups].sort();
    summary.unknownProfiles = [...unknownProfiles].sort();
    if (summary.unknownGroups.length > 0 || summary.unknownProfiles.length > 0) {
      this.logger.warn(LogCategory.RECONCILIATION, 'Desired names missing from vendor catalog', {
        groups: summary.unknownGroups,
        profiles: summary.unknownProfiles,
      });
    }

    summary.durationMs = Date.now() - startedAt;
    this.logger.info(LogCategory.RECONCILIATION, 'Reconciliation finished', {
      checked: summary.checked,
      created: summary.created,
      updated: summary.updated,
      unchanged: summary.unchanged,
      failed: summary.failed,
      durationMs: summary.durationMs,
    });
    return summary;
  }
}

function emptySummary(status: ReconciliationSummary['status']): ReconciliationSummary {
  return {
    status,
    checked: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    failed: 0,
    unknownGroups: [],
    unknownProfiles: [],
    durationMs: 0,
  };
}
