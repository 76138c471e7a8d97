import type { PushSubscriptionDocument, PushSubscriptionModelType } from '../database/models';
import { PushSubscriptionRecord } from './types';

const mapDocumentToSubscription = (doc: PushSubscriptionDocument): PushSubscriptionRecord => ({
  id: doc._id,
  endpoint: doc.endpoint,
  keys: { p256dh: doc.keys.p256dh, auth: doc.keys.auth },
  siloId: doc.siloId ?? null
});

export class PushSubscriptionRepository {
  constructor(private readonly subscriptions: PushSubscriptionModelType) {}

  async listForSilo(siloId: string): Promise<PushSubscriptionRecord[]> {
    const docs = await this.subscriptions
      .find({ $or: [{ siloId }, { siloId: null }] })
      .lean<PushSubscriptionDocument[]>()
      .exec();
    return docs.map(mapDocumentToSubscription);
  }

  async upsert(subscription: Omit<PushSubscriptionRecord, 'id'>): Promise<PushSubscriptionRecord> {
    const doc = await this.subscriptions
      .findOneAndUpdate(
        { endpoint: subscription.endpoint },
        { $set: { keys: subscription.keys, siloId: subscription.siloId } },
        { new: true, upsert: true, setDefaultsOnInsert: true }
      )
      .lean<PushSubscriptionDocument>()
      .exec();

    if (!doc) {
      throw new Error(`Push subscription upsert returned no document for ${subscription.endpoint}`);
    }
    return mapDocumentToSubscription(doc);
  }

  async deleteByEndpoint(endpoint: string): Promise<void> {
    await this.subscriptions.deleteOne({ endpoint }).exec();
  }
}
