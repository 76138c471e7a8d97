import type { AlertQuery, AlertRecord, AlertStore } from '../repositories/types';

export const DEFAULT_ALERT_LIMIT = 100;
export const MAX_ALERT_LIMIT = 500;

export type AcknowledgeOutcome =
  | { status: 'acknowledged'; alert: AlertRecord }
  | { status: 'already_acknowledged'; alert: AlertRecord }
  | { status: 'not_found' };

export class AlertService {
  constructor(
    private readonly alerts: AlertStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  list(query: Partial<AlertQuery>): Promise<AlertRecord[]> {
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_ALERT_LIMIT, 1), MAX_ALERT_LIMIT);
    return this.alerts.list({ ...query, limit });
  }

  /** Acknowledgment is set once; repeating it keeps the first acknowledger and time. */
  async acknowledge(alertId: string, userId: string): Promise<AcknowledgeOutcome> {
    const existing = await this.alerts.findById(alertId);
    if (!existing) {
      return { status: 'not_found' };
    }
    if (existing.acknowledged) {
      return { status: 'already_acknowledged', alert: existing };
    }

    const updated = await this.alerts.acknowledge(alertId, userId, this.now());
    if (!updated) {
      return { status: 'not_found' };
    }
    // Another request may have acknowledged it between the read and the update.
    if (updated.ackBy !== userId) {
      return { status: 'already_acknowledged', alert: updated };
    }
    return { status: 'acknowledged', alert: updated };
  }
}
