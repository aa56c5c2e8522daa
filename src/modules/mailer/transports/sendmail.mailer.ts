import * as fs from 'fs/promises';
import * as path from 'path';
import * as nodemailer from 'nodemailer';
import { BaseMailer } from '../base/base.mailer';
import { SendmailNotFoundException } from '../exceptions/mailer.exceptions';
import { Message } from '../interfaces/message.interface';
import { addressesToStrings, formatAddress } from '../utils/address.util';
import { validateMessage } from '../utils/message-validation.util';

export const SENDMAIL_DEFAULT_PATHS = [
  '/usr/sbin/sendmail',
  '/usr/bin/sendmail',
];

const EMPTY_BODY = '(empty body)';

export interface SendmailMailerOptions {
  /** Skips the lookup in {@link findSendmailPath}. */
  path?: string;
}

/**
 * Locates an executable `sendmail`: the usual system locations first, then
 * every directory on `PATH`.
 */
export async function findSendmailPath(
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const candidates = [
    ...SENDMAIL_DEFAULT_PATHS,
    ...(env.PATH ?? '')
      .split(path.delimiter)
      .filter((dir) => dir !== '')
      .map((dir) => path.join(dir, 'sendmail')),
  ];

  for (const candidate of candidates) {
    try {
      await fs.access(candidate, fs.constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }

  throw new SendmailNotFoundException(candidates);
}

/**
 * Delivers messages through the local `sendmail` binary.
 *
 * Only `to` recipients are used; cc, bcc and attachments are not sent. The
 * body is the HTML part when present, otherwise the text part. Intended for
 * development and simple hosts; prefer {@link SmtpMailer} in production.
 */
export class SendmailMailer extends BaseMailer {
  constructor(private readonly options: SendmailMailerOptions = {}) {
    super();
  }

  protected async deliver(message: Message): Promise<void> {
    validateMessage(message, { toOnly: true });

    const binaryPath = this.options.path || (await findSendmailPath());
    const transporter = nodemailer.createTransport({
      sendmail: true,
      newline: 'unix',
      path: binaryPath,
    });

    const to = addressesToStrings(message.to);
    const mailOptions: nodemailer.SendMailOptions = {
      from: formatAddress(message.from),
      to,
      subject: message.subject,
    };

    if (message.html) {
      mailOptions.html = message.html;
    } else {
      mailOptions.text = message.text || EMPTY_BODY;
    }

    this.logger.log(`Sending email to ${to.join(', ')} via ${binaryPath}`);

    try {
      await transporter.sendMail(mailOptions);
      this.logger.log(`Email handed to ${binaryPath}`);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Failed to send email: ${errorMessage}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }
  }
}
