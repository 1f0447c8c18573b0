import { Module } from '@nestjs/common';

import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { BootstrapService } from './bootstrap.service';

@Module({
  imports: [ReconciliationModule],
  providers: [BootstrapService],
  exports: [BootstrapService],
})
export class BootstrapModule {}
