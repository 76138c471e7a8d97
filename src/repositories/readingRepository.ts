import type { ReadingDocument, ReadingModelType } from '../database/models';
import { NewReading, ReadingRecord } from './types';

const mapDocumentToReading = (doc: ReadingDocument): ReadingRecord => ({
  id: doc._id,
  siloId: doc.siloId,
  deviceId: doc.deviceId,
  timestamp: doc.timestamp,
  temperature: doc.temperature ?? null,
  humidity: doc.humidity ?? null,
  gas: doc.gas ?? null,
  luminosityAlert: doc.luminosityAlert ?? null,
  lux: doc.lux ?? null,
  raw: doc.raw ?? {}
});

export class ReadingRepository {
  constructor(private readonly readings: ReadingModelType) {}

  async insert(reading: NewReading): Promise<ReadingRecord> {
    const created = await this.readings.create({
      siloId: reading.siloId,
      deviceId: reading.deviceId,
      timestamp: reading.timestamp,
      temperature: reading.temperature,
      humidity: reading.humidity,
      gas: reading.gas,
      luminosityAlert: reading.luminosityAlert,
      lux: reading.lux,
      raw: reading.raw
    });
    return mapDocumentToReading(created.toObject());
  }

  async findLatest(siloId: string): Promise<ReadingRecord | null> {
    const doc = await this.readings.findOne({ siloId }).sort({ timestamp: -1 }).lean<ReadingDocument>().exec();
    return doc ? mapDocumentToReading(doc) : null;
  }
}
