import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { mailerConfig } from '../config/mailer.config';
import { SendEvent } from '../events/send.event';
import type { Mailer } from '../interfaces/mailer.interface';
import { isSendInterceptor } from '../interfaces/mailer.interface';
import {
  MAILER,
  SEND_LOGGING_HOOK_ID,
  SEND_LOGGING_HOOK_PRIORITY,
} from '../mailer.constants';
import { addressesToStrings } from '../utils/address.util';

/**
 * Logs every message going through the configured mailer, with the time the
 * rest of the send chain took.
 */
@Injectable()
export class SendLoggingHook implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SendLoggingHook.name);

  constructor(
    @Inject(MAILER) private readonly mailer: Mailer,
    @Inject(mailerConfig.KEY)
    private readonly config: ConfigType<typeof mailerConfig>,
  ) {}

  onModuleInit() {
    if (!this.config.logSends) {
      return;
    }

    if (!isSendInterceptor(this.mailer)) {
      this.logger.warn(
        `${this.mailer.constructor.name} exposes no send hook, send logging disabled`,
      );
      return;
    }

    this.mailer.onSend().bind({
      id: SEND_LOGGING_HOOK_ID,
      priority: SEND_LOGGING_HOOK_PRIORITY,
      func: (event) => this.handle(event),
    });
  }

  onModuleDestroy() {
    if (isSendInterceptor(this.mailer)) {
      this.mailer.onSend().unbind(SEND_LOGGING_HOOK_ID);
    }
  }

  async handle(event: SendEvent): Promise<void> {
    const { message } = event;
    const recipients = addressesToStrings([
      ...(message.to ?? []),
      ...(message.cc ?? []),
      ...(message.bcc ?? []),
    ]);
    const startTime = Date.now();

    this.logger.log(`Sending "${message.subject}" to ${recipients.join(', ')}`);

    try {
      await event.next();
    } catch (error) {
      this.logger.error(
        `Failed to send "${message.subject}" after ${Date.now() - startTime}ms: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }

    this.logger.log(`Sent "${message.subject}" in ${Date.now() - startTime}ms`);
  }
}
