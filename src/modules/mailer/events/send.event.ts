import { HookEvent } from '../../../common/hooks';
import { Message } from '../interfaces/message.interface';

/**
 * Carries the message through a mailer's send hook. Handlers may replace
 * or edit `message` before calling `next()`.
 */
export class SendEvent extends HookEvent {
  constructor(public message: Message) {
    super();
  }
}
