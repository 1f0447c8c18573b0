import { Global, Module } from '@nestjs/common';

import { ResilienceMetricsService } from './resilience-metrics.service';

@Global()
@Module({
  providers: [ResilienceMetricsService],
  exports: [ResilienceMetricsService],
})
export class MetricsModule {}
