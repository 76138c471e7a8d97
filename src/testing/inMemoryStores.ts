import { ALERT_LEVEL_RANK } from '../repositories/types';
import type {
  AlertQuery,
  AlertRecord,
  AlertStore,
  NewAlert,
  NewReading,
  NewSiloEvent,
  PushSubscriptionRecord,
  PushSubscriptionStore,
  ReadingRecord,
  ReadingStore,
  SiloEventRecord,
  SiloEventStore,
  SiloRecord,
  SiloStore
} from '../repositories/types';

function sequence(prefix: string): () => string {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${counter}`;
  };
}

export class InMemoryReadingStore implements ReadingStore {
  readonly records: ReadingRecord[] = [];
  private readonly nextId = sequence('reading');

  async insert(reading: NewReading): Promise<ReadingRecord> {
    const record: ReadingRecord = { ...reading, id: this.nextId() };
    this.records.push(record);
    return record;
  }

  async findLatest(siloId: string): Promise<ReadingRecord | null> {
    const forSilo = this.records.filter(record => record.siloId === siloId);
    if (forSilo.length === 0) {
      return null;
    }
    return forSilo.reduce((latest, record) => (record.timestamp >= latest.timestamp ? record : latest));
  }
}

export class InMemorySiloStore implements SiloStore {
  constructor(private readonly silos: SiloRecord[] = []) {}

  add(silo: SiloRecord): void {
    this.silos.push(silo);
  }

  async findById(siloId: string): Promise<SiloRecord | null> {
    return this.silos.find(silo => silo.id === siloId) ?? null;
  }

  async findByName(name: string): Promise<SiloRecord | null> {
    return this.silos.find(silo => silo.name === name) ?? null;
  }
}

export class InMemorySiloEventStore implements SiloEventStore {
  readonly records: SiloEventRecord[] = [];
  private readonly nextId = sequence('event');

  async insert(event: NewSiloEvent): Promise<SiloEventRecord> {
    const record: SiloEventRecord = { ...event, id: this.nextId() };
    this.records.push(record);
    return record;
  }

  async listBySilo(siloId: string, limit: number): Promise<SiloEventRecord[]> {
    return this.records
      .filter(record => record.siloId === siloId)
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
      .slice(0, limit);
  }
}

export class InMemoryAlertStore implements AlertStore {
  readonly records: AlertRecord[] = [];
  private readonly nextId = sequence('alert');

  async insert(alert: NewAlert): Promise<AlertRecord> {
    const record: AlertRecord = { ...alert, id: this.nextId(), acknowledged: false, ackBy: null, ackAt: null };
    this.records.push(record);
    return { ...record };
  }

  async findById(alertId: string): Promise<AlertRecord | null> {
    const record = this.records.find(alert => alert.id === alertId);
    return record ? { ...record } : null;
  }

  async list(query: AlertQuery): Promise<AlertRecord[]> {
    return this.records
      .filter(alert => !query.siloId || alert.siloId === query.siloId)
      .filter(alert => !query.minLevel || ALERT_LEVEL_RANK[alert.level] >= ALERT_LEVEL_RANK[query.minLevel])
      .filter(alert => !query.from || alert.timestamp >= query.from)
      .filter(alert => !query.to || alert.timestamp <= query.to)
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
      .slice(0, query.limit)
      .map(alert => ({ ...alert }));
  }

  async acknowledge(alertId: string, userId: string, at: Date): Promise<AlertRecord | null> {
    const record = this.records.find(alert => alert.id === alertId);
    if (!record) {
      return null;
    }
    if (!record.acknowledged) {
      record.acknowledged = true;
      record.ackBy = userId;
      record.ackAt = at;
    }
    return { ...record };
  }
}

export class InMemoryPushSubscriptionStore implements PushSubscriptionStore {
  readonly records: PushSubscriptionRecord[] = [];
  private readonly nextId = sequence('subscription');

  async listForSilo(siloId: string): Promise<PushSubscriptionRecord[]> {
    return this.records.filter(record => record.siloId === siloId || record.siloId === null);
  }

  async upsert(subscription: Omit<PushSubscriptionRecord, 'id'>): Promise<PushSubscriptionRecord> {
    const existing = this.records.find(record => record.endpoint === subscription.endpoint);
    if (existing) {
      existing.keys = subscription.keys;
      existing.siloId = subscription.siloId;
      return { ...existing };
    }
    const record: PushSubscriptionRecord = { ...subscription, id: this.nextId() };
    this.records.push(record);
    return { ...record };
  }

  async deleteByEndpoint(endpoint: string): Promise<void> {
    const index = this.records.findIndex(record => record.endpoint === endpoint);
    if (index >= 0) {
      this.records.splice(index, 1);
    }
  }
}
