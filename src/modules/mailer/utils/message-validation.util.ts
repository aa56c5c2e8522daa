import * as EmailValidator from 'email-validator';
import { MailerValidationException } from '../exceptions/mailer.exceptions';
import { Message } from '../interfaces/message.interface';

export interface MessageValidationOptions {
  /** Only `to` recipients count (sendmail ignores cc and bcc). */
  toOnly?: boolean;
}

/**
 * Throws a {@link MailerValidationException} listing every problem found.
 */
export function validateMessage(
  message: Message | null | undefined,
  options: MessageValidationOptions = {},
): asserts message is Message {
  if (!message) {
    throw new MailerValidationException(['message is required']);
  }

  const errors: string[] = [];

  if (!message.from?.address) {
    errors.push('from address is required');
  } else if (!EmailValidator.validate(message.from.address)) {
    errors.push(`invalid email address: ${message.from.address}`);
  }

  const recipients = options.toOnly
    ? (message.to ?? [])
    : [...(message.to ?? []), ...(message.cc ?? []), ...(message.bcc ?? [])];

  if (recipients.length === 0) {
    errors.push(
      options.toOnly
        ? 'at least one "to" recipient is required'
        : 'at least one recipient (to, cc or bcc) is required',
    );
  }

  for (const recipient of recipients) {
    if (!EmailValidator.validate(recipient.address)) {
      errors.push(`invalid email address: ${recipient.address}`);
    }
  }

  if (errors.length > 0) {
    throw new MailerValidationException(errors);
  }
}
