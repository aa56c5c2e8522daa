import { Readable } from 'stream';

export interface MailAddress {
  name?: string;
  address: string;
}

export type AttachmentContent = string | Buffer | Readable;

export interface Message {
  from: MailAddress;
  to?: MailAddress[];
  cc?: MailAddress[];
  bcc?: MailAddress[];
  subject: string;
  html?: string;
  /** Generated from `html` when missing. */
  text?: string;
  headers?: Record<string, string>;
  /** File name to content. */
  attachments?: Record<string, AttachmentContent>;
  /** Referenced from the HTML body as `cid:<name>`. */
  inlineAttachments?: Record<string, AttachmentContent>;
}
