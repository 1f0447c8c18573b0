import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';

import { SyncExceptionFilter } from '../../common/filters/sync-exception.filter';
import { RepositoryModule } from '../../infrastructure/repositories/repository.module';
import { AdminModule } from '../admin/admin.module';
import { AuthModule } from '../auth/auth.module';
import { BootstrapModule } from '../bootstrap/bootstrap.module';
import { ComplianceModule } from '../compliance/compliance.module';
import { SyncConfigModule } from '../config/sync-config.module';
import { EventsModule } from '../events/events.module';
import { IntegrationsModule } from '../integrations/integrations.module';
import { LoggingModule } from '../logging/logging.module';
import { MetricsModule } from '../metrics/metrics.module';
import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { VendorModule } from '../vendor/vendor.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    ScheduleModule.forRoot(),
    SyncConfigModule,
    LoggingModule,
    MetricsModule,
    RepositoryModule.register(),
    IntegrationsModule.register(),
    AuthModule,
    ComplianceModule,
    VendorModule,
    EventsModule,
    ReconciliationModule,
    BootstrapModule,
    AdminModule,
  ],
  controllers: [HealthController],
  providers: [{ provide: APP_FILTER, useClass: SyncExceptionFilter }],
})
export class AppModule {}
