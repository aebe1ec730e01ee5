/**
 * Email Service
 *
 * Sends one HTML message per call over authenticated SMTP. Port 465 uses
 * implicit TLS; every other port upgrades with STARTTLS. No retries.
 */

import nodemailer, { type SendMailOptions } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { IMPLICIT_TLS_PORT, PLAIN_TEXT_FALLBACK } from '../config/constants';
import type { SmtpSettings } from '../config/loader';
import { ConfigurationError, DeliveryError } from '../types/errors';
import { toError } from '../types/result';

/** The slice of a nodemailer transporter this service calls. */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export type TransportFactory = (options: SMTPTransport.Options) => MailTransport;

export interface ReportMailer {
  send(subject: string, html: string): Promise<void>;
}

export interface CompleteSmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
  to: string[];
}

/**
 * Names of the delivery settings that are unset, in the order they are
 * documented.
 */
export function missingSmtpSettings(smtp: SmtpSettings): string[] {
  const missing: string[] = [];
  if (!smtp.host) missing.push('SMTP_HOST');
  if (!smtp.port) missing.push('SMTP_PORT');
  if (!smtp.user) missing.push('SMTP_USER');
  if (!smtp.pass) missing.push('SMTP_PASS');
  if (!smtp.from) missing.push('EMAIL_FROM');
  if (smtp.to.length === 0) missing.push('EMAIL_TO');
  return missing;
}

function requireComplete(smtp: SmtpSettings): CompleteSmtpSettings {
  const { host, port, user, pass, from, to } = smtp;
  if (!host || !port || !user || !pass || !from || to.length === 0) {
    throw new ConfigurationError(`Missing email settings: ${missingSmtpSettings(smtp).join(', ')}`);
  }
  return { host, port, user, pass, from, to };
}

export function buildTransportOptions(smtp: CompleteSmtpSettings): SMTPTransport.Options {
  const secure = smtp.port === IMPLICIT_TLS_PORT;
  return {
    host: smtp.host,
    port: smtp.port,
    secure,
    requireTLS: !secure,
    auth: { user: smtp.user, pass: smtp.pass },
  };
}

export class EmailService implements ReportMailer {
  private readonly smtp: SmtpSettings;
  private readonly createTransport: TransportFactory;

  constructor(smtp: SmtpSettings, createTransport: TransportFactory = (o) => nodemailer.createTransport(o)) {
    this.smtp = smtp;
    this.createTransport = createTransport;
  }

  async send(subject: string, html: string): Promise<void> {
    const smtp = requireComplete(this.smtp);
    const transport = this.createTransport(buildTransportOptions(smtp));

    console.error(`[email] Sending "${subject}" to ${smtp.to.join(', ')} via ${smtp.host}:${smtp.port}`);
    try {
      await transport.sendMail({
        from: smtp.from,
        to: smtp.to.join(', '),
        subject,
        text: PLAIN_TEXT_FALLBACK,
        html,
      });
    } catch (e) {
      throw new DeliveryError(`Failed to send email via ${smtp.host}:${smtp.port}: ${toError(e).message}`, {
        cause: e,
      });
    }
  }
}
