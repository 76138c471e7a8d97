import pino from 'pino';
import type { Logger } from 'pino';

import type {
  ChatBotChannel,
  EmailChannel,
  NotificationChannels,
  PushChannel,
  PushTarget,
  SmsChannel
} from '../notifications/channels/types';
import type { AlertRecord, SiloRecord } from '../repositories/types';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function buildSilo(overrides: Partial<SiloRecord> = {}): SiloRecord {
  return {
    id: 'silo-1',
    name: 'North Silo',
    deviceId: 'esp-north',
    location: null,
    thresholds: { maxTemp: 30, maxHumidity: 70, maxGas: 800 },
    notifications: {},
    responsible: {},
    ...overrides
  };
}

export function buildAlert(overrides: Partial<AlertRecord> = {}): AlertRecord {
  return {
    id: 'alert-1',
    siloId: 'silo-1',
    level: 'critical',
    message: 'Temperature 35 exceeds configured limit 30',
    value: 35,
    timestamp: new Date('2024-05-01T10:00:00.000Z'),
    acknowledged: false,
    ackBy: null,
    ackAt: null,
    ...overrides
  };
}

type Failure = Error | null;

export class RecordingChatChannel implements ChatBotChannel {
  readonly sent: Array<{ chatId: string; text: string }> = [];
  failure: Failure = null;

  constructor(public enabled = true) {}

  async sendMessage(chatId: string, text: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push({ chatId, text });
  }
}

export class RecordingEmailChannel implements EmailChannel {
  readonly sent: Array<{ to: string; subject: string; body: string }> = [];
  failure: Failure = null;

  constructor(public enabled = true) {}

  async sendEmail(to: string, subject: string, body: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push({ to, subject, body });
  }
}

export class RecordingSmsChannel implements SmsChannel {
  readonly sent: Array<{ to: string; text: string }> = [];
  failure: Failure = null;

  constructor(public enabled = true) {}

  async sendSms(to: string, text: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push({ to, text });
  }
}

export class RecordingPushChannel implements PushChannel {
  readonly sent: Array<{ target: PushTarget; payload: string }> = [];
  readonly failures = new Map<string, Error>();

  constructor(public enabled = true) {}

  async sendPush(target: PushTarget, payload: string): Promise<void> {
    const failure = this.failures.get(target.endpoint);
    if (failure) {
      throw failure;
    }
    this.sent.push({ target, payload });
  }
}

export interface RecordingChannels extends NotificationChannels {
  chat: RecordingChatChannel;
  email: RecordingEmailChannel;
  sms: RecordingSmsChannel;
  push: RecordingPushChannel;
}

export function recordingChannels(): RecordingChannels {
  return {
    chat: new RecordingChatChannel(),
    email: new RecordingEmailChannel(),
    sms: new RecordingSmsChannel(),
    push: new RecordingPushChannel()
  };
}
