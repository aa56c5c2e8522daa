import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { mailerConfig } from './config/mailer.config';
import { SendLoggingHook } from './hooks/send-logging.hook';
import { MAILER } from './mailer.constants';
import { createMailer } from './mailer.factory';

@Module({
  imports: [ConfigModule.forFeature(mailerConfig)],
  providers: [
    {
      provide: MAILER,
      useFactory: (config: ConfigType<typeof mailerConfig>) =>
        createMailer(config),
      inject: [mailerConfig.KEY],
    },
    SendLoggingHook,
  ],
  exports: [MAILER],
})
export class MailerModule {}
