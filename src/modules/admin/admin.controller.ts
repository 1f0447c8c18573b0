import { ConflictException, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';

import { toConfigurationView } from '../../domain/models/desired-configuration.model';
import { BootstrapService, type BootstrapSummary } from '../bootstrap/bootstrap.service';
import { ComplianceRulesService } from '../compliance/compliance-rules.service';
import { ChangeEventDispatcher } from '../events/change-event.dispatcher';
import { SyncLogger } from '../logging/sync-logger.service';
import { LogCategory, isLogCategory, parseLogLevel } from '../logging/log-levels';
import { ResilienceMetricsService } from '../metrics/resilience-metrics.service';
import { ReconciliationService, type ReconciliationSummary } from '../reconciliation/reconciliation.service';
import { ResilientVendorClient } from '../vendor/resilient-vendor.client';
import { VendorRetryQueue } from '../vendor/vendor-retry.queue';

@Controller('admin')
export class AdminController {
  constructor(
    private readonly rules: ComplianceRulesService,
    private readonly reconciliation: ReconciliationService,
    private readonly bootstrap: BootstrapService,
    private readonly metrics: ResilienceMetricsService,
    private readonly dispatcher: ChangeEventDispatcher,
    private readonly vendor: ResilientVendorClient,
    private readonly retryQueue: VendorRetryQueue,
    private readonly logger: SyncLogger,
  ) {}

  /** Desired configuration as the rules compute it right now. */
  @Get('users/:username/configuration')
  async getConfiguration(@Param('username') username: string) {
    return toConfigurationView(await this.rules.calculate(username));
  }

  @Post('reconciliation/run')
  @HttpCode(HttpStatus.OK)
  async runReconciliation(): Promise<ReconciliationSummary> {
    if (this.reconciliation.isRunning) {
      throw new ConflictException('Reconciliation already running');
    }
    this.logger.info(LogCategory.HTTP, 'Manual reconciliation requested');
    return this.reconciliation.runDailyTrueUp();
  }

  /** Wipes and reseeds the state store. */
  @Post('bootstrap')
  @HttpCode(HttpStatus.OK)
  async runBootstrap(): Promise<BootstrapSummary> {
    if (this.bootstrap.isRunning) {
      throw new ConflictException('Bootstrap already running');
    }
    this.logger.warn(LogCategory.HTTP, 'Forced re-bootstrap requested');
    return this.bootstrap.run('admin');
  }

  @Get('stats')
  getStats() {
    return {
      ...this.metrics.getStats(),
      breaker: this.vendor.breakerState,
      dispatcher: { paused: this.dispatcher.isPaused, pending: this.dispatcher.backlogSize },
      retryQueue: this.retryQueue.list(),
    };
  }

  @Get('logs/recent')
  getRecentLogs(
    @Query('limit') limit?: string,
    @Query('level') level?: string,
    @Query('category') category?: string,
    @Query('correlationId') correlationId?: string,
  ) {
    const entries = this.logger.getRecentLogs({
      limit: limit ? Number(limit) : undefined,
      level: level ? parseLogLevel(level) : undefined,
      category: category && isLogCategory(category) ? category : undefined,
      correlationId: correlationId || undefined,
    });
    return { count: entries.length, entries };
  }

  @Delete('logs/recent')
  @HttpCode(HttpStatus.NO_CONTENT)
  clearRecentLogs(): void {
    this.logger.clearRecentLogs();
  }
}
