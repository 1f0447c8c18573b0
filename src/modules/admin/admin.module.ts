import { Module } from '@nestjs/common';

import { BootstrapModule } from '../bootstrap/bootstrap.module';
import { ComplianceModule } from '../compliance/compliance.module';
import { EventsModule } from '../events/events.module';
import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { VendorModule } from '../vendor/vendor.module';
import { AdminController } from './admin.controller';

@Module({
  imports: [BootstrapModule, ComplianceModule, EventsModule, ReconciliationModule, VendorModule],
  controllers: [AdminController],
})
export class AdminModule {}
