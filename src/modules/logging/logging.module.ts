import { Global, Module } from '@nestjs/common';

import { LogConfigController } from './log-config.controller';
import { SyncLogger } from './sync-logger.service';

@Global()
@Module({
  controllers: [LogConfigController],
  providers: [SyncLogger],
  exports: [SyncLogger],
})
export class LoggingModule {}
