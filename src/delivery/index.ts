/**
 * Delivery Module
 */

export {
  SmtpMailer,
  ConsoleMailer,
  createMailer,
  type Mailer,
  type MailTransport,
  type TransportFactory,
  type SmtpSettings,
  type SmtpTransportOptions,
  type DigestMessage,
  type DeliveryReceipt,
  type EmailProvider,
} from './email.js';
