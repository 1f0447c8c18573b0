import { Module } from '@nestjs/common';

import { ComplianceModule } from '../compliance/compliance.module';
import { VendorModule } from '../vendor/vendor.module';
import { ReconciliationService } from './reconciliation.service';

@Module({
  imports: [ComplianceModule, VendorModule],
  providers: [ReconciliationService],
  exports: [ReconciliationService],
})
export class ReconciliationModule {}
