export type AlertLevel = 'warning' | 'critical';

export const ALERT_LEVELS: readonly AlertLevel[] = ['warning', 'critical'];

export const ALERT_LEVEL_RANK: Record<AlertLevel, number> = {
  warning: 1,
  critical: 2
};

export type SiloEventType = 'silo_opened';

export interface ReadingValues {
  temperature: number | null;
  humidity: number | null;
  gas: number | null;
  luminosityAlert: number | null;
  lux: number | null;
}

export interface ReadingRecord extends ReadingValues {
  id: string;
  siloId: string;
  deviceId: string;
  timestamp: Date;
  raw: Record<string, unknown>;
}

export interface SiloThresholds {
  maxTemp?: number | null;
  maxHumidity?: number | null;
  maxGas?: number | null;
}

export interface NotificationTemplates {
  telegramText?: string | null;
  emailSubject?: string | null;
  emailBody?: string | null;
  smsBody?: string | null;
  pushText?: string | null;
}

export interface SiloNotificationSettings {
  telegram?: boolean | null;
  email?: boolean | null;
  sms?: boolean | null;
  push?: boolean | null;
  templates?: NotificationTemplates | null;
}

export interface ResponsibleContact {
  telegramChatId?: string | null;
  email?: string | null;
  phone?: string | null;
}

export interface SiloRecord {
  id: string;
  name: string;
  deviceId: string | null;
  location: { lat: number; lon: number } | null;
  thresholds: SiloThresholds;
  notifications: SiloNotificationSettings;
  responsible: ResponsibleContact;
}

export interface SiloEventRecord {
  id: string;
  siloId: string;
  eventType: SiloEventType;
  payload: Record<string, unknown>;
  timestamp: Date;
}

export type AlertValue = number | Record<string, number | null> | null;

export interface AlertRecord {
  id: string;
  siloId: string;
  level: AlertLevel;
  message: string;
  value: AlertValue;
  timestamp: Date;
  acknowledged: boolean;
  ackBy: string | null;
  ackAt: Date | null;
}

export type NewAlert = Omit<AlertRecord, 'id' | 'acknowledged' | 'ackBy' | 'ackAt'>;
export type NewSiloEvent = Omit<SiloEventRecord, 'id'>;
export type NewReading = Omit<ReadingRecord, 'id'>;

export interface PushKeys {
  p256dh: string;
  auth: string;
}

export interface PushSubscriptionRecord {
  id: string;
  endpoint: string;
  keys: PushKeys;
  siloId: string | null;
}

export interface AlertQuery {
  siloId?: string;
  minLevel?: AlertLevel;
  from?: Date;
  to?: Date;
  limit: number;
}

export interface ReadingStore {
  insert(reading: NewReading): Promise<ReadingRecord>;
  findLatest(siloId: string): Promise<ReadingRecord | null>;
}

export interface SiloStore {
  findById(siloId: string): Promise<SiloRecord | null>;
  findByName(name: string): Promise<SiloRecord | null>;
}

export interface SiloEventStore {
  insert(event: NewSiloEvent): Promise<SiloEventRecord>;
  listBySilo(siloId: string, limit: number): Promise<SiloEventRecord[]>;
}

export interface AlertStore {
  insert(alert: NewAlert): Promise<AlertRecord>;
  findById(alertId: string): Promise<AlertRecord | null>;
  list(query: AlertQuery): Promise<AlertRecord[]>;
  /**
   * Sets the acknowledgment fields only when the alert is still unacknowledged.
   * Returns the stored alert afterwards, or null when no alert has that id.
   */
  acknowledge(alertId: string, userId: string, at: Date): Promise<AlertRecord | null>;
}

export interface PushSubscriptionStore {
  /** Subscriptions scoped to the silo plus the global ones (siloId null). */
  listForSilo(siloId: string): Promise<PushSubscriptionRecord[]>;
  upsert(subscription: Omit<PushSubscriptionRecord, 'id'>): Promise<PushSubscriptionRecord>;
  deleteByEndpoint(endpoint: string): Promise<void>;
}
