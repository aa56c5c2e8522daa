export * from './base/base.mailer';
export * from './config/mailer.config';
export * from './events/send.event';
export * from './exceptions/mailer.exceptions';
export * from './hooks/send-logging.hook';
export * from './interfaces/mailer.interface';
export * from './interfaces/message.interface';
export * from './mailer.constants';
export * from './mailer.factory';
export * from './mailer.module';
export * from './transports/sendmail.mailer';
export * from './transports/smtp.mailer';
export * from './utils/address.util';
export * from './utils/html-to-text.util';
export * from './utils/message-validation.util';
