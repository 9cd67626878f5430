/**
 * E-mail notifier
 *
 * Sends the plain-text notification over SMTP with nodemailer. Port 465 uses
 * implicit TLS, any other port upgrades with STARTTLS. Without credentials the
 * message is only logged.
 */

import nodemailer from 'nodemailer';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { NotificationMessage } from '../types/index.js';

export interface SmtpSettings {
  host: string;
  port: number;
  sender: string;
  password: string;
  receiver: string;
}

export interface SmtpTransportOptions {
  host: string;
  port: number;
  secure: boolean;
  requireTLS: boolean;
  auth: { user: string; pass: string };
}

export interface MailPayload {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/**
 * The part of a nodemailer transporter the notifier uses
 */
export interface MailTransport {
  sendMail(mail: MailPayload): Promise<unknown>;
}

/**
 * Delivers one notification; rejects when delivery fails
 */
export interface Notifier {
  readonly kind: 'smtp' | 'log';
  send(message: NotificationMessage): Promise<void>;
}

export function buildTransportOptions(settings: SmtpSettings): SmtpTransportOptions {
  const implicitTls = settings.port === 465;
  return {
    host: settings.host,
    port: settings.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: { user: settings.sender, pass: settings.password },
  };
}

export class SmtpNotifier implements Notifier {
  readonly kind = 'smtp';
  private readonly transport: MailTransport;

  constructor(
    private readonly settings: SmtpSettings,
    transport?: MailTransport
  ) {
    this.transport = transport ?? nodemailer.createTransport(buildTransportOptions(settings));
  }

  async send(message: NotificationMessage): Promise<void> {
    await this.transport.sendMail({
      from: this.settings.sender,
      to: this.settings.receiver,
      subject: message.subject,
      text: message.body,
    });
    logger.info({ to: this.settings.receiver, subject: message.subject }, 'Notification email sent');
  }
}

/**
 * Stand-in used when SMTP is not configured
 */
export class LogNotifier implements Notifier {
  readonly kind = 'log';

  async send(message: NotificationMessage): Promise<void> {
    logger.warn('SMTP credentials not configured, logging notification instead of sending');
    logger.info({ subject: message.subject, body: message.body }, 'Notification preview');
  }
}

/**
 * SMTP when sender, password and receiver are all set, otherwise the log stand-in
 */
export function createNotifier(smtp: {
  host: string;
  port: number;
  sender?: string;
  password?: string;
  receiver?: string;
} = config.smtp): Notifier {
  const { host, port, sender, password, receiver } = smtp;
  if (sender && password && receiver) {
    return new SmtpNotifier({ host, port, sender, password, receiver });
  }
  return new LogNotifier();
}
