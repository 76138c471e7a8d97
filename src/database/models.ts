import { randomUUID } from 'node:crypto';

import { Schema, model } from 'mongoose';

import type { AlertLevel, AlertValue, NotificationTemplates, PushKeys, SiloEventType } from '../repositories/types';

export interface ReadingDocument {
  _id: string;
  siloId: string;
  deviceId: string;
  timestamp: Date;
  temperature: number | null;
  humidity: number | null;
  gas: number | null;
  luminosityAlert: number | null;
  lux: number | null;
  raw: Record<string, unknown>;
}

export interface SiloDocument {
  _id: string;
  name: string;
  deviceId?: string | null;
  location?: { lat?: number | null; lon?: number | null } | null;
  thresholds?: { maxTemp?: number | null; maxHumidity?: number | null; maxGas?: number | null } | null;
  notifications?: {
    telegram?: boolean | null;
    email?: boolean | null;
    sms?: boolean | null;
    push?: boolean | null;
    templates?: NotificationTemplates | null;
  } | null;
  responsible?: { telegramChatId?: string | null; email?: string | null; phone?: string | null } | null;
  createdAt?: Date;
}

export interface SiloEventDocument {
  _id: string;
  siloId: string;
  eventType: SiloEventType;
  payload: Record<string, unknown>;
  timestamp: Date;
}

export interface AlertDocument {
  _id: string;
  siloId: string;
  level: AlertLevel;
  message: string;
  value: AlertValue;
  timestamp: Date;
  acknowledged: boolean;
  ackBy: string | null;
  ackAt: Date | null;
}

export interface PushSubscriptionDocument {
  _id: string;
  endpoint: string;
  keys: PushKeys;
  siloId: string | null;
}

const uuidId = { type: String, default: () => randomUUID() };

const readingSchema = new Schema<ReadingDocument>(
  {
    _id: uuidId,
    siloId: { type: String, required: true },
    deviceId: { type: String, required: true },
    timestamp: { type: Date, required: true },
    temperature: { type: Number, default: null },
    humidity: { type: Number, default: null },
    gas: { type: Number, default: null },
    luminosityAlert: { type: Number, default: null },
    lux: { type: Number, default: null },
    raw: { type: Schema.Types.Mixed, default: {} }
  },
  { collection: 'readings', versionKey: false, minimize: false }
);
readingSchema.index({ siloId: 1, timestamp: -1 });

const siloSchema = new Schema<SiloDocument>(
  {
    _id: uuidId,
    name: { type: String, required: true, index: true },
    deviceId: { type: String, default: null },
    location: {
      lat: { type: Number },
      lon: { type: Number }
    },
    thresholds: {
      maxTemp: { type: Number, default: null },
      maxHumidity: { type: Number, default: null },
      maxGas: { type: Number, default: null }
    },
    notifications: {
      telegram: { type: Boolean, default: null },
      email: { type: Boolean, default: null },
      sms: { type: Boolean, default: null },
      push: { type: Boolean, default: null },
      templates: { type: Schema.Types.Mixed, default: null }
    },
    responsible: {
      telegramChatId: { type: String, default: null },
      email: { type: String, default: null },
      phone: { type: String, default: null }
    }
  },
  { collection: 'silos', versionKey: false, timestamps: { createdAt: true, updatedAt: false } }
);

const siloEventSchema = new Schema<SiloEventDocument>(
  {
    _id: uuidId,
    siloId: { type: String, required: true, index: true },
    eventType: { type: String, enum: ['silo_opened'], required: true },
    payload: { type: Schema.Types.Mixed, default: {} },
    timestamp: { type: Date, required: true }
  },
  { collection: 'silo_events', versionKey: false, minimize: false }
);

const alertSchema = new Schema<AlertDocument>(
  {
    _id: uuidId,
    siloId: { type: String, required: true, index: true },
    level: { type: String, enum: ['warning', 'critical'], required: true },
    message: { type: String, required: true },
    value: { type: Schema.Types.Mixed, default: null },
    timestamp: { type: Date, required: true },
    acknowledged: { type: Boolean, default: false },
    ackBy: { type: String, default: null },
    ackAt: { type: Date, default: null }
  },
  { collection: 'alerts', versionKey: false }
);
alertSchema.index({ timestamp: -1 });

const pushSubscriptionSchema = new Schema<PushSubscriptionDocument>(
  {
    _id: uuidId,
    endpoint: { type: String, required: true, unique: true },
    keys: {
      p256dh: { type: String, required: true },
      auth: { type: String, required: true }
    },
    siloId: { type: String, default: null, index: true }
  },
  { collection: 'push_subscriptions', versionKey: false }
);

export const ReadingModel = model<ReadingDocument>('Reading', readingSchema);
export const SiloModel = model<SiloDocument>('Silo', siloSchema);
export const SiloEventModel = model<SiloEventDocument>('SiloEvent', siloEventSchema);
export const AlertModel = model<AlertDocument>('Alert', alertSchema);
export const PushSubscriptionModel = model<PushSubscriptionDocument>('PushSubscription', pushSubscriptionSchema);

export type ReadingModelType = typeof ReadingModel;
export type SiloModelType = typeof SiloModel;
export type SiloEventModelType = typeof SiloEventModel;
export type AlertModelType = typeof AlertModel;
export type PushSubscriptionModelType = typeof PushSubscriptionModel;
