import { Module } from '@nestjs/common';

import { ComplianceRulesService } from './compliance-rules.service';

@Module({
  providers: [ComplianceRulesService],
  exports: [ComplianceRulesService],
})
export class ComplianceModule {}
