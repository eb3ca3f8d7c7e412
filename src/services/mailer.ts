import nodemailer, { Transporter } from 'nodemailer';
import type { SmtpConfig } from '../config';
import { HttpError } from '../utils/errors';

export type MailAttachment = { filename: string; content: Buffer };

export type MailMessage = {
  to: string;
  subject: string;
  text: string;
  attachments?: MailAttachment[];
};

export type MailerState = 'ready' | 'disabled' | 'unconfigured';

export class Mailer {
  constructor(
    private readonly transporter: Transporter | null,
    private readonly from: string,
    readonly state: MailerState = transporter ? 'ready' : 'unconfigured'
  ) {}

  async send(message: MailMessage): Promise<string> {
    if (!this.transporter) {
      throw new HttpError(
        503,
        'Email service not configured. Please configure SMTP_HOST, SMTP_USER, and SMTP_PASS environment variables.'
      );
    }
    const info = await this.transporter.sendMail({ from: this.from, ...message });
    return typeof info.messageId === 'string' ? info.messageId : '';
  }
}

export function createMailer(smtp: SmtpConfig): Mailer {
  if (smtp.disabled) return new Mailer(null, '', 'disabled');
  if (!smtp.host || !smtp.user || !smtp.pass) return new Mailer(null, '');

  const transporter = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: { user: smtp.user, pass: smtp.pass },
    connectionTimeout: 8000,
    greetingTimeout: 8000,
    socketTimeout: 8000,
  });
  return new Mailer(transporter, smtp.from ?? smtp.user);
}
