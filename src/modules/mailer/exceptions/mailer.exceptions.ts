export class MailerValidationException extends Error {
  constructor(public errors: string[]) {
    super(errors.join(', '));
    this.name = 'MailerValidationException';
  }
}

export class MailerAuthException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MailerAuthException';
  }
}

export class SendmailNotFoundException extends Error {
  constructor(public searched: string[]) {
    super(`Unable to locate a sendmail executable (tried ${searched.join(', ')})`);
    this.name = 'SendmailNotFoundException';
  }
}
