import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as nodemailer from 'nodemailer';

import { SmtpMailer, SmtpMailerOptions } from './smtp.mailer';
import { SendEvent } from '../events/send.event';
import {
  MailerAuthException,
  MailerValidationException,
} from '../exceptions/mailer.exceptions';
import { Message } from '../interfaces/message.interface';

vi.mock('nodemailer');

const mockNodemailer = nodemailer;

describe('SmtpMailer', () => {
  let mockTransporter: nodemailer.Transporter;

  const defaultOptions: SmtpMailerOptions = {
    host: 'smtp.example.com',
    port: 587,
    tls: true,
  };

  const createMessage = (overrides: Partial<Message> = {}): Message => ({
    from: { name: 'Sender', address: 'sender@example.com' },
    to: [{ name: 'Jane', address: 'jane@example.com' }],
    subject: 'Welcome',
    html: '<p>Hello <b>Jane</b></p>',
    ...overrides,
  });

  const sentOptions = (): nodemailer.SendMailOptions => {
    const sendMail = mockTransporter.sendMail as ReturnType<typeof vi.fn>;
    const [options] = sendMail.mock.calls[0] as [nodemailer.SendMailOptions];
    return options;
  };

  beforeEach(() => {
    mockTransporter = {
      sendMail: vi.fn().mockResolvedValue({ messageId: '<sent@example.com>' }),
    } as unknown as nodemailer.Transporter;

    (
      mockNodemailer.createTransport as ReturnType<typeof vi.fn>
    ).mockReturnValue(mockTransporter);
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('send', () => {
    it('should map the message onto nodemailer options', async () => {
      const mailer = new SmtpMailer(defaultOptions);

      await mailer.send(
        createMessage({
          cc: [{ address: 'copy@example.com' }],
          headers: { 'X-Campaign': 'spring' },
        }),
      );

      expect(mockNodemailer.createTransport).toHaveBeenCalledWith({
        host: 'smtp.example.com',
        port: 587,
        secure: false,
      });
      expect(sentOptions()).toEqual({
        from: { name: 'Sender', address: 'sender@example.com' },
        to: [{ name: 'Jane', address: 'jane@example.com' }],
        cc: [{ name: '', address: 'copy@example.com' }],
        subject: 'Welcome',
        html: '<p>Hello <b>Jane</b></p>',
        text: 'Hello Jane',
        headers: { 'X-Campaign': 'spring' },
        messageId: expect.stringMatching(/^<[A-Za-z0-9]{15}@example\.com>$/),
      });
    });

    it('should keep an explicit text part and Message-ID header', async () => {
      const mailer = new SmtpMailer(defaultOptions);

      await mailer.send(
        createMessage({
          text: 'Plain version',
          headers: { 'message-id': '<custom@example.com>' },
        }),
      );

      const options = sentOptions();
      expect(options.text).toBe('Plain version');
      expect(options.messageId).toBeUndefined();
      expect(options.headers).toEqual({
        'message-id': '<custom@example.com>',
      });
    });

    it('should send HTML with malformed character references', async () => {
      const mailer = new SmtpMailer(defaultOptions);

      await mailer.send(createMessage({ html: '<p>Price &#99999999;</p>' }));

      expect(sentOptions().text).toBe('Price \uFFFD');
    });

    it('should attach regular and inline attachments', async () => {
      const mailer = new SmtpMailer(defaultOptions);
      const report = Buffer.from('report');
      const logo = Buffer.from('logo');

      await mailer.send(
        createMessage({
          attachments: { 'report.pdf': report },
          inlineAttachments: { 'logo.png': logo },
        }),
      );

      expect(sentOptions().attachments).toEqual([
        { filename: 'report.pdf', content: report },
        {
          filename: 'logo.png',
          content: logo,
          cid: 'logo.png',
          contentDisposition: 'inline',
        },
      ]);
    });

    it('should reuse the transporter across sends', async () => {
      const mailer = new SmtpMailer(defaultOptions);

      await mailer.send(createMessage());
      await mailer.send(createMessage());

      expect(mockNodemailer.createTransport).toHaveBeenCalledTimes(1);
      expect(mockTransporter.sendMail).toHaveBeenCalledTimes(2);
    });

    it('should reject invalid messages before connecting', async () => {
      const mailer = new SmtpMailer(defaultOptions);

      await expect(
        mailer.send(createMessage({ to: [] })),
      ).rejects.toBeInstanceOf(MailerValidationException);
      expect(mockNodemailer.createTransport).not.toHaveBeenCalled();
    });

    it('should propagate delivery failures unchanged', async () => {
      const failure = new Error('Connection refused');
      (mockTransporter.sendMail as ReturnType<typeof vi.fn>).mockRejectedValue(
        failure,
      );
      const mailer = new SmtpMailer(defaultOptions);

      await expect(mailer.send(createMessage())).rejects.toBe(failure);
    });
  });

  describe('transport options', () => {
    it('should use implicit TLS and PLAIN auth on port 465', async () => {
      const mailer = new SmtpMailer({
        host: 'smtp.example.com',
        port: 465,
        tls: true,
        username: 'mailer',
        password: 'test-secret',
        localName: 'mail.example.com',
      });

      await mailer.send(createMessage());

      expect(mockNodemailer.createTransport).toHaveBeenCalledWith({
        host: 'smtp.example.com',
        port: 465,
        secure: true,
        auth: { user: 'mailer', pass: 'test-secret' },
        authMethod: 'PLAIN',
        name: 'mail.example.com',
      });
    });

    it('should leave STARTTLS opportunistic without credentials', async () => {
      const mailer = new SmtpMailer({
        host: 'smtp.example.com',
        port: 25,
        tls: false,
      });

      await mailer.send(createMessage());

      expect(mockNodemailer.createTransport).toHaveBeenCalledWith({
        host: 'smtp.example.com',
        port: 25,
        secure: false,
      });
    });

    it('should require both username and password', async () => {
      const mailer = new SmtpMailer({ ...defaultOptions, username: 'mailer' });

      await expect(mailer.send(createMessage())).rejects.toThrow(
        new MailerAuthException(
          'both username and password are required when using SMTP auth',
        ),
      );
      expect(mockTransporter.sendMail).not.toHaveBeenCalled();
    });

    it('should require STARTTLS before sending credentials to a remote host', async () => {
      const mailer = new SmtpMailer({
        host: 'smtp.example.com',
        port: 25,
        tls: false,
        username: 'mailer',
        password: 'test-secret',
      });

      await mailer.send(createMessage());

      expect(mockNodemailer.createTransport).toHaveBeenCalledWith({
        host: 'smtp.example.com',
        port: 25,
        secure: false,
        requireTLS: true,
        auth: { user: 'mailer', pass: 'test-secret' },
        authMethod: 'PLAIN',
      });
    });

    it('should require STARTTLS for LOGIN auth on the submission port', async () => {
      const mailer = new SmtpMailer({
        ...defaultOptions,
        username: 'mailer',
        password: 'test-secret',
        authMethod: 'LOGIN',
      });

      await mailer.send(createMessage());

      expect(mockNodemailer.createTransport).toHaveBeenCalledWith({
        host: 'smtp.example.com',
        port: 587,
        secure: false,
        requireTLS: true,
        auth: { user: 'mailer', pass: 'test-secret' },
        authMethod: 'LOGIN',
      });
    });

    it('should allow plain connections to a local server with credentials', async () => {
      const mailer = new SmtpMailer({
        host: '127.0.0.1',
        port: 25,
        username: 'mailer',
        password: 'test-secret',
        authMethod: 'LOGIN',
      });

      await mailer.send(createMessage());

      expect(mockNodemailer.createTransport).toHaveBeenCalledWith({
        host: '127.0.0.1',
        port: 25,
        secure: false,
        auth: { user: 'mailer', pass: 'test-secret' },
        authMethod: 'LOGIN',
      });
    });
  });

  describe('onSend', () => {
    it('should return the same hook every time', () => {
      const mailer = new SmtpMailer(defaultOptions);

      expect(mailer.onSend()).toBe(mailer.onSend());
    });

    it('should deliver as the innermost step of the hook', async () => {
      const mailer = new SmtpMailer(defaultOptions);
      const calls: string[] = [];
      (mockTransporter.sendMail as ReturnType<typeof vi.fn>).mockImplementation(
        async () => {
          calls.push('deliver');
          return { messageId: '<sent@example.com>' };
        },
      );

      mailer.onSend().bindFunc(async (e: SendEvent) => {
        calls.push(`before:${e.message.subject}`);
        await e.next();
        calls.push('after');
      });

      await mailer.send(createMessage());

      expect(calls).toEqual(['before:Welcome', 'deliver', 'after']);
    });

    it('should not deliver when a handler vetoes the send', async () => {
      const mailer = new SmtpMailer(defaultOptions);
      const veto = new Error('recipient is suppressed');

      mailer.onSend().bindFunc(() => {
        throw veto;
      });

      await expect(mailer.send(createMessage())).rejects.toBe(veto);
      expect(mockTransporter.sendMail).not.toHaveBeenCalled();
    });

    it('should deliver the message as rewritten by handlers', async () => {
      const mailer = new SmtpMailer(defaultOptions);

      mailer.onSend().bindFunc(async (e) => {
        e.message = { ...e.message, subject: `[staging] ${e.message.subject}` };
        await e.next();
      });

      await mailer.send(createMessage());

      expect(sentOptions().subject).toBe('[staging] Welcome');
    });

    it('should let handlers observe delivery failures', async () => {
      const failure = new Error('Mailbox unavailable');
      (mockTransporter.sendMail as ReturnType<typeof vi.fn>).mockRejectedValue(
        failure,
      );
      const mailer = new SmtpMailer(defaultOptions);
      let observed: unknown;

      mailer.onSend().bindFunc(async (e) => {
        try {
          await e.next();
        } catch (error) {
          observed = error;
          throw error;
        }
      });

      await expect(mailer.send(createMessage())).rejects.toBe(failure);
      expect(observed).toBe(failure);
    });
  });
});
