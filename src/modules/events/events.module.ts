import { Module } from '@nestjs/common';

import { ComplianceModule } from '../compliance/compliance.module';
import { VendorModule } from '../vendor/vendor.module';
import { ChangeEventDispatcher } from './change-event.dispatcher';
import { ChangeEventProcessor } from './change-event.processor';
import { EventsController } from './events.controller';

@Module({
  imports: [ComplianceModule, VendorModule],
  controllers: [EventsController],
  providers: [ChangeEventProcessor, ChangeEventDispatcher],
  exports: [ChangeEventDispatcher],
})
export class EventsModule {}
