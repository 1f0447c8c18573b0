import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';

import { PoisonMessageError } from '../../domain/errors';
import { ChangeEventDispatcher, type EventKind, type IntakeReceipt } from './change-event.dispatcher';

/**
 * Webhook-style event ingress. Each route takes one event or an array.
 * A single malformed event is answered with 400; in an array the malformed
 * entries are reported in the receipt and the rest are accepted.
 */
@Controller('events')
export class EventsController {
  constructor(private readonly dispatcher: ChangeEventDispatcher) {}

  @Post('directory')
  @HttpCode(HttpStatus.ACCEPTED)
  directory(@Body() body: unknown): IntakeReceipt {
    return this.accept('directory', body);
  }

  @Post('team')
  @HttpCode(HttpStatus.ACCEPTED)
  team(@Body() body: unknown): IntakeReceipt {
    return this.accept('team', body);
  }

  private accept(kind: EventKind, body: unknown): IntakeReceipt {
    if (Array.isArray(body)) {
      return this.dispatcher.submit(kind, body);
    }
    const receipt = this.dispatcher.submit(kind, [body]);
    const [rejected] = receipt.poison;
    if (rejected) {
      throw new PoisonMessageError(`Malformed ${kind} event`, rejected.issues);
    }
    return receipt;
  }
}
