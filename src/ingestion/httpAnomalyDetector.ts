import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';

import type { ReadingRecord } from '../repositories/types';
import type { AnomalyDetector, AnomalyScore } from './thresholdRules';

const anomalyResponseSchema = z.object({
  is_anomaly: z.boolean(),
  score: z.number()
});

/** Scores readings against an external model service. */
export class HttpAnomalyDetector implements AnomalyDetector {
  constructor(
    private readonly url: string,
    private readonly http: AxiosInstance = axios.create({ timeout: 10_000 })
  ) {}

  async score(reading: ReadingRecord): Promise<AnomalyScore> {
    const response = await this.http.post(this.url, {
      silo_id: reading.siloId,
      timestamp: reading.timestamp.toISOString(),
      temperature: reading.temperature,
      humidity: reading.humidity,
      gas: reading.gas,
      lux: reading.lux
    });

    const parsed = anomalyResponseSchema.parse(response.data);
    return { flagged: parsed.is_anomaly, score: parsed.score };
  }
}
