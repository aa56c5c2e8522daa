import * as nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { pseudorandomString } from '../../../common/utils/random-string';
import { BaseMailer } from '../base/base.mailer';
import { MailerAuthException } from '../exceptions/mailer.exceptions';
import { MailAddress, Message } from '../interfaces/message.interface';
import { addressesToStrings } from '../utils/address.util';
import { htmlToText } from '../utils/html-to-text.util';
import { validateMessage } from '../utils/message-validation.util';

export type SmtpAuthMethod = 'PLAIN' | 'LOGIN';

export const SMTP_AUTH_PLAIN: SmtpAuthMethod = 'PLAIN';
export const SMTP_AUTH_LOGIN: SmtpAuthMethod = 'LOGIN';

const IMPLICIT_TLS_PORT = 465;
const MESSAGE_ID_LENGTH = 15;
const LOCALHOST_NAMES = ['localhost', '127.0.0.1', '::1'];

export interface SmtpMailerOptions {
  host: string;
  /** Usually 25, 465 or 587. */
  port: number;
  /**
   * Implicit TLS on port 465. On any other port the connection is upgraded
   * with STARTTLS when the server offers it, and must be when credentials go
   * to a remote host.
   */
  tls?: boolean;
  username?: string;
  password?: string;
  /** Defaults to PLAIN. Some providers (Outlook) only accept LOGIN. */
  authMethod?: SmtpAuthMethod;
  /** Name sent with EHLO/HELO; nodemailer defaults to the machine hostname. */
  localName?: string;
}

function toNodemailerAddress(address: MailAddress): Mail.Address {
  return { name: address.name ?? '', address: address.address };
}

function isLocalhost(host: string): boolean {
  return LOCALHOST_NAMES.includes(host);
}

/**
 * Delivers messages over SMTP. The nodemailer transporter is created on the
 * first send and reused afterwards.
 */
export class SmtpMailer extends BaseMailer {
  private transporter:
    | nodemailer.Transporter<SMTPTransport.SentMessageInfo>
    | undefined;

  constructor(private readonly options: SmtpMailerOptions) {
    super();
  }

  protected async deliver(message: Message): Promise<void> {
    validateMessage(message);

    const transporter = this.getTransporter();
    const mailOptions = this.buildMailOptions(message);
    const recipients = addressesToStrings([
      ...(message.to ?? []),
      ...(message.cc ?? []),
      ...(message.bcc ?? []),
    ]);

    this.logger.log(
      `Sending email to ${recipients.join(', ')} via ${this.options.host}:${this.options.port}`,
    );

    try {
      const info = await transporter.sendMail(mailOptions);
      this.logger.log(`Email sent successfully: ${info.messageId}`);
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

  private getTransporter(): nodemailer.Transporter<SMTPTransport.SentMessageInfo> {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport(
        this.buildTransportOptions(),
      );
      this.logger.log(
        `SMTP transporter configured with ${this.options.host}:${this.options.port}`,
      );
    }
    return this.transporter;
  }

  private buildTransportOptions(): SMTPTransport.Options {
    const {
      host,
      port,
      tls = false,
      username = '',
      password = '',
      authMethod = SMTP_AUTH_PLAIN,
      localName,
    } = this.options;

    const secure = tls && port === IMPLICIT_TLS_PORT;
    const transportOptions: SMTPTransport.Options = { host, port, secure };

    if (username || password) {
      if (!username || !password) {
        throw new MailerAuthException(
          'both username and password are required when using SMTP auth',
        );
      }

      transportOptions.auth = { user: username, pass: password };
      transportOptions.authMethod = authMethod;

      // credentials only travel encrypted unless the server is local
      if (!secure && !isLocalhost(host)) {
        transportOptions.requireTLS = true;
      }
    }

    if (localName) {
      transportOptions.name = localName;
    }

    return transportOptions;
  }

  private buildMailOptions(message: Message): nodemailer.SendMailOptions {
    const mailOptions: nodemailer.SendMailOptions = {
      from: toNodemailerAddress(message.from),
      subject: message.subject,
    };

    if (message.to?.length) {
      mailOptions.to = message.to.map(toNodemailerAddress);
    }
    if (message.cc?.length) {
      mailOptions.cc = message.cc.map(toNodemailerAddress);
    }
    if (message.bcc?.length) {
      mailOptions.bcc = message.bcc.map(toNodemailerAddress);
    }

    if (message.html) {
      mailOptions.html = message.html;
    }
    const text = message.text || (message.html ? htmlToText(message.html) : '');
    if (text) {
      mailOptions.text = text;
    }

    const attachments: Mail.Attachment[] = [];
    for (const [filename, content] of Object.entries(
      message.attachments ?? {},
    )) {
      attachments.push({ filename, content });
    }
    for (const [filename, content] of Object.entries(
      message.inlineAttachments ?? {},
    )) {
      attachments.push({
        filename,
        content,
        cid: filename,
        contentDisposition: 'inline',
      });
    }
    if (attachments.length > 0) {
      mailOptions.attachments = attachments;
    }

    const headers = { ...(message.headers ?? {}) };
    mailOptions.headers = headers;

    const hasMessageId = Object.keys(headers).some(
      (key) => key.toLowerCase() === 'message-id',
    );
    if (!hasMessageId) {
      const fromParts = message.from.address.split('@');
      if (fromParts.length === 2) {
        mailOptions.messageId = `<${pseudorandomString(MESSAGE_ID_LENGTH)}@${fromParts[1]}>`;
      }
    }

    return mailOptions;
  }
}
