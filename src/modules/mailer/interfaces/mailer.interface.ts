import { Hook } from '../../../common/hooks';
import { SendEvent } from '../events/send.event';
import { Message } from './message.interface';

export interface Mailer {
  send(message: Message): Promise<void>;
}

/**
 * Optional mailer capability exposing the hook every send runs through.
 */
export interface SendInterceptor {
  onSend(): Hook<SendEvent>;
}

export function isSendInterceptor(
  mailer: Mailer,
): mailer is Mailer & SendInterceptor {
  return 'onSend' in mailer && typeof mailer.onSend === 'function';
}
