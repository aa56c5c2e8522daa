import { Logger } from '@nestjs/common';
import { Hook } from '../../../common/hooks';
import { SendEvent } from '../events/send.event';
import { Mailer, SendInterceptor } from '../interfaces/mailer.interface';
import { Message } from '../interfaces/message.interface';

export abstract class BaseMailer implements Mailer, SendInterceptor {
  protected readonly logger: Logger;
  private sendHook: Hook<SendEvent> | undefined;

  constructor() {
    this.logger = new Logger(this.constructor.name);
  }

  /**
   * Hook every `send` runs through. Delivery itself is the last step of the
   * chain, so a handler that does not call `next()` prevents it.
   *
   * @example
   * mailer.onSend().bindFunc(async (e) => {
   *   console.log('sending', e.message.subject);
   *   await e.next();
   * });
   */
  onSend(): Hook<SendEvent> {
    if (!this.sendHook) {
      this.sendHook = new Hook<SendEvent>({
        name: `${this.constructor.name}.onSend`,
      });
    }
    return this.sendHook;
  }

  async send(message: Message): Promise<void> {
    if (this.sendHook) {
      return this.sendHook.trigger(new SendEvent(message), (e) =>
        this.deliver(e.message),
      );
    }

    return this.deliver(message);
  }

  protected abstract deliver(message: Message): Promise<void>;
}
