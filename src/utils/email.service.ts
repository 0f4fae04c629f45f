import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { EmailConfig } from '../connections/config/app.config';
import { getLogger } from './logging';

const log = getLogger('email');

export interface ConfirmationEmail {
  email: string;
  username: string;
  token: string;
  /** Origin the link points back to, e.g. http://localhost:3000 */
  baseUrl: string;
}

/**
 * What the auth flow needs from mail delivery.
 */
export interface Mailer {
  sendConfirmationEmail(data: ConfirmationEmail): Promise<void>;
}

type MailTransport = Pick<Transporter, 'sendMail'>;

export const createTransport = (config: EmailConfig): Transporter =>
  nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    auth: {
      user: config.user,
      pass: config.pass,
    },
  });

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

export const buildConfirmationLink = (baseUrl: string, token: string): string =>
  `${baseUrl.replace(/\/+$/, '')}/api/auth/confirmed_email/${encodeURIComponent(token)}`;

export const renderConfirmationEmail = (username: string, link: string): string => `
    <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px;">
      <h2 style="color: #333; border-bottom: 2px solid #667eea; padding-bottom: 10px;">
        Confirm your email
      </h2>
      <p>Hello <strong>${escapeHtml(username)}</strong>,</p>
      <p>Thanks for signing up. Please confirm your email address by following the link below:</p>
      <p><a href="${escapeHtml(link)}" style="color: #667eea;">${escapeHtml(link)}</a></p>
      <p style="color: #999; font-size: 12px;">The link is valid for 7 days.</p>
      <p style="color: #999; font-size: 12px;">If you did not create an account, you can ignore this email.</p>
    </div>
  `;

/**
 * Sends confirmation emails over SMTP. Delivery failures are logged and
 * never rethrown: a lost email must not fail the request that caused it.
 */
export class EmailService implements Mailer {
  constructor(
    private readonly config: EmailConfig,
    private readonly transport: MailTransport = createTransport(config)
  ) {}

  async sendConfirmationEmail({ email, username, token, baseUrl }: ConfirmationEmail): Promise<void> {
    if (!this.config.user || !this.config.pass) {
      log.warn('Email not configured, skipping confirmation email', { email });
      return;
    }

    const link = buildConfirmationLink(baseUrl, token);

    try {
      await this.transport.sendMail({
        from: `"${this.config.fromName}" <${this.config.user}>`,
        to: email,
        subject: 'Confirm your email',
        html: renderConfirmationEmail(username, link),
      });
      log.info('Confirmation email sent successfully', { email });
    } catch (error: unknown) {
      log.error('Failed to send confirmation email', {
        email,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
