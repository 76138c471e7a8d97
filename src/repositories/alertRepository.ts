import type { FilterQuery } from 'mongoose';

import type { AlertDocument, AlertModelType } from '../database/models';
import { ALERT_LEVEL_RANK, ALERT_LEVELS, AlertLevel, AlertQuery, AlertRecord, NewAlert } from './types';

const mapDocumentToAlert = (doc: AlertDocument): AlertRecord => ({
  id: doc._id,
  siloId: doc.siloId,
  level: doc.level,
  message: doc.message,
  value: doc.value ?? null,
  timestamp: doc.timestamp,
  acknowledged: doc.acknowledged === true,
  ackBy: doc.ackBy ?? null,
  ackAt: doc.ackAt ?? null
});

export function levelsAtOrAbove(minLevel: AlertLevel): AlertLevel[] {
  return ALERT_LEVELS.filter(
    level => ALERT_LEVEL_RANK[level] >= ALERT_LEVEL_RANK[minLevel]
  );
}

export class AlertRepository {
  constructor(private readonly alerts: AlertModelType) {}

  async insert(alert: NewAlert): Promise<AlertRecord> {
    const created = await this.alerts.create({
      siloId: alert.siloId,
      level: alert.level,
      message: alert.message,
      value: alert.value,
      timestamp: alert.timestamp,
      acknowledged: false,
      ackBy: null,
      ackAt: null
    });
    return mapDocumentToAlert(created.toObject());
  }

  async findById(alertId: string): Promise<AlertRecord | null> {
    const doc = await this.alerts.findById(alertId).lean<AlertDocument>().exec();
    return doc ? mapDocumentToAlert(doc) : null;
  }

  async list(query: AlertQuery): Promise<AlertRecord[]> {
    const filter: FilterQuery<AlertDocument> = {};
    if (query.siloId) {
      filter.siloId = query.siloId;
    }
    if (query.minLevel) {
      filter.level = { $in: levelsAtOrAbove(query.minLevel) };
    }
    if (query.from || query.to) {
      filter.timestamp = {
        ...(query.from ? { $gte: query.from } : {}),
        ...(query.to ? { $lte: query.to } : {})
      };
    }

    const docs = await this.alerts
      .find(filter)
      .sort({ timestamp: -1 })
      .limit(query.limit)
      .lean<AlertDocument[]>()
      .exec();
    return docs.map(mapDocumentToAlert);
  }

  async acknowledge(alertId: string, userId: string, at: Date): Promise<AlertRecord | null> {
    const updated = await this.alerts
      .findOneAndUpdate(
        { _id: alertId, acknowledged: false },
        { $set: { acknowledged: true, ackBy: userId, ackAt: at } },
        { new: true }
      )
      .lean<AlertDocument>()
      .exec();

    if (updated) {
      return mapDocumentToAlert(updated);
    }

    // Already acknowledged (or missing): the stored fields stay untouched.
    return this.findById(alertId);
  }
}
