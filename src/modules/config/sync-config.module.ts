import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CLOCK, systemClock } from '../../common/clock';
import { SYNC_CONFIG, buildSyncConfig } from './sync-config';

@Global()
@Module({
  providers: [
    {
      provide: SYNC_CONFIG,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => buildSyncConfig((key) => config.get<string>(key)),
    },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [SYNC_CONFIG, CLOCK],
})
export class SyncConfigModule {}
