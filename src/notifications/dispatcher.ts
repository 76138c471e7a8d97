import type { Logger } from 'pino';

import { PushSubscriptionGoneError, withTimeout } from '../errors';
import type { AlertRecord, PushSubscriptionRecord, PushSubscriptionStore, SiloRecord, SiloStore } from '../repositories/types';
import type { NotificationChannels } from './channels/types';
import { buildTemplateContext, mergeTemplates, renderTemplate } from './templates';

export type ChannelName = 'telegram' | 'email' | 'sms' | 'push';

export type DeliveryStatus = 'delivered' | 'failed' | 'skipped' | 'removed';

export interface ChannelOutcome {
  channel: ChannelName;
  target: string;
  status: DeliveryStatus;
}

export interface DispatchReport {
  alertId: string;
  outcomes: ChannelOutcome[];
  broadcast: boolean;
}

export interface AlertBroadcaster {
  broadcast(message: string): Promise<unknown>;
}

export interface LiveAlertEvent {
  type: 'alert';
  siloId: string;
  level: AlertRecord['level'];
  message: string;
  timestamp: string;
}

export interface NotificationDispatcherOptions {
  silos: SiloStore;
  subscriptions: PushSubscriptionStore;
  channels: NotificationChannels;
  broadcaster: AlertBroadcaster;
  logger: Logger;
  channelTimeoutMs: number;
}

export const PUSH_TITLE = 'Silo Monitor';

export function toLiveAlertEvent(alert: AlertRecord): LiveAlertEvent {
  return {
    type: 'alert',
    siloId: alert.siloId,
    level: alert.level,
    message: alert.message,
    timestamp: alert.timestamp.toISOString()
  };
}

/**
 * Fans a persisted alert out to every configured channel. Each delivery attempt is
 * independent: failures are logged and reported, never thrown to the caller.
 */
export class NotificationDispatcher {
  private readonly silos: SiloStore;
  private readonly subscriptions: PushSubscriptionStore;
  private readonly channels: NotificationChannels;
  private readonly broadcaster: AlertBroadcaster;
  private readonly logger: Logger;
  private readonly channelTimeoutMs: number;

  constructor(options: NotificationDispatcherOptions) {
    this.silos = options.silos;
    this.subscriptions = options.subscriptions;
    this.channels = options.channels;
    this.broadcaster = options.broadcaster;
    this.logger = options.logger;
    this.channelTimeoutMs = options.channelTimeoutMs;
  }

  async dispatch(alert: AlertRecord): Promise<DispatchReport> {
    const silo = await this.resolveSilo(alert.siloId);
    const templates = mergeTemplates(silo?.notifications.templates);
    const context = buildTemplateContext(alert, silo?.name ?? 'Silo');

    const attempts: Array<Promise<ChannelOutcome[]>> = [];

    if (silo) {
      const { responsible, notifications } = silo;

      if (responsible.telegramChatId && notifications.telegram !== false) {
        const chatId = responsible.telegramChatId;
        const text = renderTemplate(templates.telegramText, context);
        attempts.push(
          this.attempt('telegram', chatId, this.channels.chat.enabled, () => this.channels.chat.sendMessage(chatId, text))
        );
      }

      if (responsible.email && notifications.email !== false) {
        const to = responsible.email;
        const subject = renderTemplate(templates.emailSubject, context);
        const body = renderTemplate(templates.emailBody, context);
        attempts.push(
          this.attempt('email', to, this.channels.email.enabled, () => this.channels.email.sendEmail(to, subject, body))
        );
      }

      if (responsible.phone && notifications.sms !== false) {
        const phone = responsible.phone;
        const text = renderTemplate(templates.smsBody, context);
        attempts.push(this.attempt('sms', phone, this.channels.sms.enabled, () => this.channels.sms.sendSms(phone, text)));
      }
    }

    if (silo?.notifications.push !== false) {
      const payload = JSON.stringify({
        title: PUSH_TITLE,
        body: renderTemplate(templates.pushText, context),
        alertId: alert.id,
        siloId: alert.siloId,
        level: alert.level
      });
      attempts.push(this.fanOutPush(alert, payload));
    }

    const settled = await Promise.allSettled(attempts);
    const outcomes: ChannelOutcome[] = [];
    settled.forEach(result => {
      if (result.status === 'fulfilled') {
        outcomes.push(...result.value);
      } else {
        this.logger.error({ err: result.reason, alertId: alert.id }, 'Notification attempt crashed');
      }
    });

    const broadcast = await this.broadcastAlert(alert);

    this.logger.info(
      {
        alertId: alert.id,
        siloId: alert.siloId,
        level: alert.level,
        delivered: outcomes.filter(outcome => outcome.status === 'delivered').length,
        failed: outcomes.filter(outcome => outcome.status === 'failed').length
      },
      'Alert dispatch finished'
    );

    return { alertId: alert.id, outcomes, broadcast };
  }

  private async resolveSilo(siloId: string): Promise<SiloRecord | null> {
    try {
      const silo = await this.silos.findById(siloId);
      if (!silo) {
        this.logger.warn({ siloId }, 'Alert references an unknown silo; only global push and live broadcast apply');
      }
      return silo;
    } catch (error) {
      this.logger.error({ err: error, siloId }, 'Failed to load silo for notification');
      return null;
    }
  }

  private async attempt(
    channel: ChannelName,
    target: string,
    enabled: boolean,
    send: () => Promise<void>
  ): Promise<ChannelOutcome[]> {
    if (!enabled) {
      return [{ channel, target, status: 'skipped' }];
    }

    try {
      await withTimeout(channel, this.channelTimeoutMs, send);
      return [{ channel, target, status: 'delivered' }];
    } catch (error) {
      this.logger.error({ err: error, channel, target }, 'Notification delivery failed');
      return [{ channel, target, status: 'failed' }];
    }
  }

  private async fanOutPush(alert: AlertRecord, payload: string): Promise<ChannelOutcome[]> {
    if (!this.channels.push.enabled) {
      return [];
    }

    let targets: PushSubscriptionRecord[];
    try {
      targets = await this.subscriptions.listForSilo(alert.siloId);
    } catch (error) {
      this.logger.error({ err: error, siloId: alert.siloId }, 'Failed to load push subscriptions');
      return [];
    }

    return Promise.all(targets.map(subscription => this.deliverPush(subscription, payload)));
  }

  private async deliverPush(subscription: PushSubscriptionRecord, payload: string): Promise<ChannelOutcome> {
    const target = subscription.endpoint;
    try {
      await withTimeout('push', this.channelTimeoutMs, () =>
        this.channels.push.sendPush({ endpoint: subscription.endpoint, keys: subscription.keys }, payload)
      );
      return { channel: 'push', target, status: 'delivered' };
    } catch (error) {
      if (!(error instanceof PushSubscriptionGoneError)) {
        this.logger.warn({ err: error, endpoint: target }, 'Push delivery failed; keeping subscription');
        return { channel: 'push', target, status: 'failed' };
      }

      try {
        await this.subscriptions.deleteByEndpoint(target);
        this.logger.info({ endpoint: target, statusCode: error.statusCode }, 'Removed expired push subscription');
        return { channel: 'push', target, status: 'removed' };
      } catch (deleteError) {
        this.logger.error({ err: deleteError, endpoint: target }, 'Failed to remove expired push subscription');
        return { channel: 'push', target, status: 'failed' };
      }
    }
  }

  private async broadcastAlert(alert: AlertRecord): Promise<boolean> {
    try {
      await this.broadcaster.broadcast(JSON.stringify(toLiveAlertEvent(alert)));
      return true;
    } catch (error) {
      this.logger.warn({ err: error, alertId: alert.id }, 'Live alert broadcast failed');
      return false;
    }
  }
}
