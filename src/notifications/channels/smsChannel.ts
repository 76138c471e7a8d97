import axios, { AxiosInstance } from 'axios';
import type { Logger } from 'pino';

import type { SmsChannel } from './types';

export interface TwilioSettings {
  accountSid: string;
  authToken: string;
  from: string;
}

const TWILIO_BASE_URL = 'https://api.twilio.com/2010-04-01';

export class TwilioSmsChannel implements SmsChannel {
  readonly enabled: boolean;

  constructor(
    private readonly settings: TwilioSettings | null,
    private readonly logger: Logger,
    private readonly http: AxiosInstance = axios.create({ baseURL: TWILIO_BASE_URL, timeout: 15_000 })
  ) {
    this.enabled = settings !== null;
  }

  async sendSms(to: string, text: string): Promise<void> {
    if (!this.settings) {
      this.logger.debug({ to }, 'Twilio not configured; skipping SMS');
      return;
    }

    const { accountSid, authToken, from } = this.settings;
    const body = new URLSearchParams({ From: from, To: to, Body: text });
    await this.http.post(`/Accounts/${encodeURIComponent(accountSid)}/Messages.json`, body.toString(), {
      auth: { username: accountSid, password: authToken },
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
    });
  }
}

export function createSmsChannel(settings: TwilioSettings | null, logger: Logger): TwilioSmsChannel {
  if (!settings) {
    logger.warn('Twilio is not configured. SMS notifications are disabled.');
  }
  return new TwilioSmsChannel(settings, logger);
}
