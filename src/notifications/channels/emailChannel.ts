import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { Logger } from 'pino';

import type { EmailChannel } from './types';

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
}

export class SmtpEmailChannel implements EmailChannel {
  readonly enabled: boolean;

  constructor(
    private readonly transporter: Pick<Transporter, 'sendMail'> | null,
    private readonly from: string,
    private readonly logger: Logger
  ) {
    this.enabled = transporter !== null;
  }

  async sendEmail(to: string, subject: string, body: string): Promise<void> {
    if (!this.transporter) {
      this.logger.debug({ to }, 'SMTP not configured; skipping email');
      return;
    }
    await this.transporter.sendMail({ from: this.from, to, subject, text: body });
  }
}

export function createEmailChannel(settings: SmtpSettings | null, logger: Logger, timeoutMs: number): SmtpEmailChannel {
  if (!settings) {
    logger.warn('SMTP is not configured. Email notifications are disabled.');
    return new SmtpEmailChannel(null, '', logger);
  }

  const transporter = nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.port === 465,
    requireTLS: settings.port !== 465,
    auth: { user: settings.user, pass: settings.pass },
    connectionTimeout: timeoutMs,
    socketTimeout: timeoutMs
  });
  return new SmtpEmailChannel(transporter, settings.from, logger);
}
