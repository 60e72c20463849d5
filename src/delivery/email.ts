/**
 * E-mail Delivery
 *
 * Sends the digest over SMTP (nodemailer), or prints it for local runs.
 */

import nodemailer from 'nodemailer';
import { logger } from '../utils/logger.js';
import { DeliveryConfigError, DeliveryTransportError, errorMessage } from '../utils/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type EmailProvider = 'smtp' | 'console';

export interface DigestMessage {
  subject: string;
  body: string;
}

export interface DeliveryReceipt {
  messageId: string;
  recipients: string[];
  sentAt: string;
}

export interface Mailer {
  send(message: DigestMessage): Promise<DeliveryReceipt>;
}

export interface SmtpSettings {
  host: string | undefined;
  port: number;
  user: string | undefined;
  password: string | undefined;
  recipients: readonly string[];
}

export interface SmtpTransportOptions {
  host: string;
  port: number;
  secure: boolean;
  auth: { user: string; pass: string };
}

export interface MailTransport {
  sendMail(mail: { from: string; to: string[]; subject: string; text: string }): Promise<{ messageId?: string }>;
}

export type TransportFactory = (options: SmtpTransportOptions) => MailTransport;

const createSmtpTransport: TransportFactory = (options) => nodemailer.createTransport(options);

// ═══════════════════════════════════════════════════════════════════════════════
// Providers
// ═══════════════════════════════════════════════════════════════════════════════

export class SmtpMailer implements Mailer {
  constructor(
    private readonly settings: SmtpSettings,
    private readonly createTransport: TransportFactory = createSmtpTransport
  ) {}

  async send(message: DigestMessage): Promise<DeliveryReceipt> {
    const { host, port, user, password } = this.settings;
    const recipients = [...this.settings.recipients];

    if (!host || !user || !password || recipients.length === 0) {
      throw new DeliveryConfigError('SMTP credentials or recipient list not configured');
    }

    logger.info({ host, port, recipients: recipients.length, subject: message.subject }, 'Sending digest e-mail');

    const transport = this.createTransport({
      host,
      port,
      secure: port === 465,
      auth: { user, pass: password },
    });

    try {
      const info = await transport.sendMail({
        from: user,
        to: recipients,
        subject: message.subject,
        text: message.body,
      });

      const receipt: DeliveryReceipt = {
        messageId: info.messageId ?? '',
        recipients,
        sentAt: new Date().toISOString(),
      };

      logger.info({ messageId: receipt.messageId }, 'Digest e-mail sent');
      return receipt;
    } catch (error) {
      throw new DeliveryTransportError(`SMTP delivery failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Prints the digest instead of sending it
 */
export class ConsoleMailer implements Mailer {
  constructor(private readonly recipients: readonly string[] = []) {}

  async send(message: DigestMessage): Promise<DeliveryReceipt> {
    console.log('='.repeat(60));
    console.log(`To: ${this.recipients.join(', ')}`);
    console.log(`Subject: ${message.subject}`);
    console.log('-'.repeat(40));
    console.log(message.body);
    console.log('='.repeat(60));

    return {
      messageId: `console-${Date.now()}`,
      recipients: [...this.recipients],
      sentAt: new Date().toISOString(),
    };
  }
}

export function createMailer(provider: EmailProvider, settings: SmtpSettings): Mailer {
  switch (provider) {
    case 'smtp':
      return new SmtpMailer(settings);
    case 'console':
      return new ConsoleMailer(settings.recipients);
  }
}
