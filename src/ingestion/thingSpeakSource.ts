import axios, { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { z } from 'zod';

import type { RawReading } from './normalizer';

const THINGSPEAK_BASE_URL = 'https://api.thingspeak.com';

const feedResponseSchema = z.object({
  feeds: z.array(z.record(z.unknown())).default([])
});

export interface ReadingSource {
  fetchLatest(channelId: string, readKey: string | null): Promise<RawReading | null>;
}

export class ThingSpeakSource implements ReadingSource {
  constructor(
    private readonly logger: Logger,
    private readonly http: AxiosInstance = axios.create({ baseURL: THINGSPEAK_BASE_URL, timeout: 10_000 })
  ) {}

  async fetchLatest(channelId: string, readKey: string | null): Promise<RawReading | null> {
    const response = await this.http.get(`/channels/${encodeURIComponent(channelId)}/feeds.json`, {
      params: { results: 1, ...(readKey ? { api_key: readKey } : {}) },
      validateStatus: () => true
    });

    if (response.status !== 200) {
      this.logger.error({ channelId, status: response.status }, 'ThingSpeak feed request failed');
      return null;
    }

    const parsed = feedResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.error({ channelId, details: parsed.error.flatten() }, 'Unexpected ThingSpeak feed payload');
      return null;
    }

    const { feeds } = parsed.data;
    if (feeds.length === 0) {
      this.logger.info({ channelId }, 'ThingSpeak feed is empty');
      return null;
    }

    return feeds[feeds.length - 1];
  }
}
