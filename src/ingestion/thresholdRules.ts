import type { Logger } from 'pino';

import type { NewAlert, ReadingRecord, ReadingValues, SiloThresholds } from '../repositories/types';

export interface AnomalyScore {
  flagged: boolean;
  score: number;
}

/** Optional scoring capability; leaving it out disables the anomaly rule. */
export interface AnomalyDetector {
  score(reading: ReadingRecord): Promise<AnomalyScore>;
}

export const ANOMALY_MESSAGE = 'Anomaly detected by model';

interface ThresholdRule {
  metric: 'temperature' | 'humidity' | 'gas';
  label: string;
  limit: keyof SiloThresholds;
}

const THRESHOLD_RULES: readonly ThresholdRule[] = [
  { metric: 'temperature', label: 'Temperature', limit: 'maxTemp' },
  { metric: 'humidity', label: 'Humidity', limit: 'maxHumidity' },
  { metric: 'gas', label: 'Gas', limit: 'maxGas' }
];

export function formatBreachMessage(label: string, value: number, limit: number): string {
  return `${label} ${value} exceeds configured limit ${limit}`;
}

export function evaluateThresholds(
  siloId: string,
  values: Pick<ReadingValues, 'temperature' | 'humidity' | 'gas'>,
  thresholds: SiloThresholds,
  timestamp: Date
): NewAlert[] {
  const alerts: NewAlert[] = [];

  for (const rule of THRESHOLD_RULES) {
    const limit = thresholds[rule.limit];
    const value = values[rule.metric];
    if (typeof limit !== 'number' || typeof value !== 'number') {
      continue;
    }
    if (value > limit) {
      alerts.push({
        siloId,
        level: 'critical',
        message: formatBreachMessage(rule.label, value, limit),
        value,
        timestamp
      });
    }
  }

  return alerts;
}

export class ThresholdRuleEngine {
  constructor(
    private readonly logger: Logger,
    private readonly anomalyDetector: AnomalyDetector | null = null,
    private readonly now: () => Date = () => new Date()
  ) {}

  async evaluate(reading: ReadingRecord, thresholds: SiloThresholds): Promise<NewAlert[]> {
    const timestamp = this.now();
    const alerts = evaluateThresholds(reading.siloId, reading, thresholds, timestamp);

    if (!this.anomalyDetector) {
      return alerts;
    }

    try {
      const result = await this.anomalyDetector.score(reading);
      if (result.flagged) {
        alerts.push({
          siloId: reading.siloId,
          level: 'warning',
          message: ANOMALY_MESSAGE,
          value: result.score,
          timestamp
        });
      }
    } catch (error) {
      this.logger.error({ err: error, siloId: reading.siloId, readingId: reading.id }, 'Anomaly detection failed');
    }

    return alerts;
  }
}
