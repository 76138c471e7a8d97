import type { PushKeys } from '../../repositories/types';

export interface ChatBotChannel {
  readonly enabled: boolean;
  sendMessage(chatId: string, text: string): Promise<void>;
}

export interface EmailChannel {
  readonly enabled: boolean;
  sendEmail(to: string, subject: string, body: string): Promise<void>;
}

export interface SmsChannel {
  readonly enabled: boolean;
  sendSms(to: string, text: string): Promise<void>;
}

export interface PushTarget {
  endpoint: string;
  keys: PushKeys;
}

export interface PushChannel {
  readonly enabled: boolean;
  /** Rejects with PushSubscriptionGoneError when the endpoint is permanently invalid. */
  sendPush(target: PushTarget, payload: string): Promise<void>;
}

export interface NotificationChannels {
  chat: ChatBotChannel;
  email: EmailChannel;
  sms: SmsChannel;
  push: PushChannel;
}
