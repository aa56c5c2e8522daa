export const MAILER = 'MAILER';

export const SEND_LOGGING_HOOK_ID = 'send-logging';
export const SEND_LOGGING_HOOK_PRIORITY = -100;
