import type { SiloDocument, SiloModelType } from '../database/models';
import { SiloRecord } from './types';

const mapDocumentToSilo = (doc: SiloDocument): SiloRecord => {
  const lat = doc.location?.lat;
  const lon = doc.location?.lon;
  return {
    id: doc._id,
    name: doc.name,
    deviceId: doc.deviceId ?? null,
    location: typeof lat === 'number' && typeof lon === 'number' ? { lat, lon } : null,
    thresholds: {
      maxTemp: doc.thresholds?.maxTemp ?? null,
      maxHumidity: doc.thresholds?.maxHumidity ?? null,
      maxGas: doc.thresholds?.maxGas ?? null
    },
    notifications: {
      telegram: doc.notifications?.telegram ?? null,
      email: doc.notifications?.email ?? null,
      sms: doc.notifications?.sms ?? null,
      push: doc.notifications?.push ?? null,
      templates: doc.notifications?.templates ?? null
    },
    responsible: {
      telegramChatId: doc.responsible?.telegramChatId ?? null,
      email: doc.responsible?.email ?? null,
      phone: doc.responsible?.phone ?? null
    }
  };
};

export class SiloRepository {
  constructor(private readonly silos: SiloModelType) {}

  async findById(siloId: string): Promise<SiloRecord | null> {
    const doc = await this.silos.findById(siloId).lean<SiloDocument>().exec();
    return doc ? mapDocumentToSilo(doc) : null;
  }

  async findByName(name: string): Promise<SiloRecord | null> {
    const doc = await this.silos.findOne({ name }).lean<SiloDocument>().exec();
    return doc ? mapDocumentToSilo(doc) : null;
  }
}
