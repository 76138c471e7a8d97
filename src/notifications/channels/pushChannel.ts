import type { Logger } from 'pino';
import { sendNotification } from 'web-push';
import type { PushSubscription as WebPushSubscription, RequestOptions } from 'web-push';

import { PushSubscriptionGoneError } from '../../errors';
import type { PushChannel, PushTarget } from './types';

export interface VapidSettings {
  subject: string;
  publicKey: string;
  privateKey: string;
}

export type PushSender = (
  subscription: WebPushSubscription,
  payload: string,
  options: RequestOptions
) => Promise<unknown>;

const GONE_STATUS_CODES = new Set([404, 410]);

function readStatusCode(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return null;
  }
  const { statusCode } = error;
  return typeof statusCode === 'number' ? statusCode : null;
}

export class WebPushChannel implements PushChannel {
  readonly enabled: boolean;

  constructor(
    private readonly vapid: VapidSettings | null,
    private readonly logger: Logger,
    private readonly timeoutMs: number,
    private readonly send: PushSender = (subscription, payload, options) =>
      sendNotification(subscription, payload, options)
  ) {
    this.enabled = vapid !== null;
  }

  async sendPush(target: PushTarget, payload: string): Promise<void> {
    if (!this.vapid) {
      this.logger.debug({ endpoint: target.endpoint }, 'VAPID keys not configured; skipping push');
      return;
    }

    try {
      await this.send({ endpoint: target.endpoint, keys: target.keys }, payload, {
        vapidDetails: this.vapid,
        TTL: 3600,
        timeout: this.timeoutMs
      });
    } catch (error) {
      const statusCode = readStatusCode(error);
      if (statusCode !== null && GONE_STATUS_CODES.has(statusCode)) {
        throw new PushSubscriptionGoneError(target.endpoint, statusCode);
      }
      throw error;
    }
  }
}

export function createPushChannel(vapid: VapidSettings | null, logger: Logger, timeoutMs: number): WebPushChannel {
  if (!vapid) {
    logger.warn('VAPID keys are not configured. Push notifications are disabled.');
  }
  return new WebPushChannel(vapid, logger, timeoutMs);
}
