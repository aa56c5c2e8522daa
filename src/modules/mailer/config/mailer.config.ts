import { registerAs } from '@nestjs/config';
import * as Joi from 'joi';
import { SmtpAuthMethod, SmtpMailerOptions } from '../transports/smtp.mailer';
import { SendmailMailerOptions } from '../transports/sendmail.mailer';

export type MailerTransport = 'smtp' | 'sendmail';

export interface MailerConfig {
  transport: MailerTransport;
  smtp: SmtpMailerOptions;
  sendmail: SendmailMailerOptions;
  logSends: boolean;
}

export interface ValidatedMailerEnv {
  MAILER_TRANSPORT: MailerTransport;
  MAILER_LOG_SENDS: boolean;
  SMTP_HOST: string;
  SMTP_PORT: number;
  SMTP_TLS: boolean;
  SMTP_USER?: string;
  SMTP_PASS?: string;
  SMTP_AUTH_METHOD: SmtpAuthMethod;
  SMTP_LOCAL_NAME?: string;
  SENDMAIL_PATH?: string;
}

const mailerConfigSchema = Joi.object({
  MAILER_TRANSPORT: Joi.string().valid('smtp', 'sendmail').default('smtp'),
  MAILER_LOG_SENDS: Joi.boolean().default(true),

  // SMTP transport
  SMTP_HOST: Joi.string().hostname().default('localhost'),
  SMTP_PORT: Joi.number().port().default(587),
  SMTP_TLS: Joi.boolean().default(true),
  SMTP_USER: Joi.string().optional().allow(''),
  SMTP_PASS: Joi.string().optional().allow(''),
  SMTP_AUTH_METHOD: Joi.string().valid('PLAIN', 'LOGIN').default('PLAIN'),
  SMTP_LOCAL_NAME: Joi.string().hostname().optional().allow(''),

  // Sendmail transport
  SENDMAIL_PATH: Joi.string().optional().allow(''),
});

export function validateMailerConfig(
  env: Record<string, unknown>,
): ValidatedMailerEnv {
  const result = mailerConfigSchema.validate(env, {
    allowUnknown: true,
    abortEarly: false,
  });

  if (result.error) {
    throw new Error(
      `Mailer configuration validation failed: ${result.error.details
        .map((detail) => detail.message)
        .join(', ')}`,
    );
  }

  return result.value as ValidatedMailerEnv;
}

export function createMailerConfig(env: ValidatedMailerEnv): MailerConfig {
  return {
    transport: env.MAILER_TRANSPORT,
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      tls: env.SMTP_TLS,
      username: env.SMTP_USER || undefined,
      password: env.SMTP_PASS || undefined,
      authMethod: env.SMTP_AUTH_METHOD,
      localName: env.SMTP_LOCAL_NAME || undefined,
    },
    sendmail: {
      path: env.SENDMAIL_PATH || undefined,
    },
    logSends: env.MAILER_LOG_SENDS,
  };
}

export const mailerConfig = registerAs('mailer', (): MailerConfig =>
  createMailerConfig(validateMailerConfig(process.env)),
);
