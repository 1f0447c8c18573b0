import { Controller, Get } from '@nestjs/common';

import { Public } from '../auth/public.decorator';
import { ResilientVendorClient } from '../vendor/resilient-vendor.client';

@Public()
@Controller('health')
export class HealthController {
  constructor(private readonly vendor: ResilientVendorClient) {}

  @Get()
  health() {
    return { status: 'ok', vendorCircuit: this.vendor.breakerState, uptimeSeconds: Math.round(process.uptime()) };
  }
}
