import type { SiloEventDocument, SiloEventModelType } from '../database/models';
import { NewSiloEvent, SiloEventRecord } from './types';

const mapDocumentToEvent = (doc: SiloEventDocument): SiloEventRecord => ({
  id: doc._id,
  siloId: doc.siloId,
  eventType: doc.eventType,
  payload: doc.payload ?? {},
  timestamp: doc.timestamp
});

export class SiloEventRepository {
  constructor(private readonly events: SiloEventModelType) {}

  async insert(event: NewSiloEvent): Promise<SiloEventRecord> {
    const created = await this.events.create({
      siloId: event.siloId,
      eventType: event.eventType,
      payload: event.payload,
      timestamp: event.timestamp
    });
    return mapDocumentToEvent(created.toObject());
  }

  async listBySilo(siloId: string, limit: number): Promise<SiloEventRecord[]> {
    const docs = await this.events
      .find({ siloId })
      .sort({ timestamp: -1 })
      .limit(limit)
      .lean<SiloEventDocument[]>()
      .exec();
    return docs.map(mapDocumentToEvent);
  }
}
