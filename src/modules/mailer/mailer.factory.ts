import { MailerConfig } from './config/mailer.config';
import { Mailer } from './interfaces/mailer.interface';
import { SendmailMailer } from './transports/sendmail.mailer';
import { SmtpMailer } from './transports/smtp.mailer';

export function createMailer(config: MailerConfig): Mailer {
  switch (config.transport) {
    case 'sendmail':
      return new SendmailMailer(config.sendmail);
    case 'smtp':
      return new SmtpMailer(config.smtp);
  }
}
